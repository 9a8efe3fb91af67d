import { relative } from "node:path";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { serveStatic } from "@hono/node-server/serve-static";
import { ClipArchiveError } from "@cliparchive/core/errors";
import { createIngestPipeline } from "@cliparchive/core/ingest";
import type { ServerConfig } from "@cliparchive/core/schemas";
import type { ClipSource, Sleep } from "@cliparchive/core/source";
import type { Logger } from "pino";
import { healthRoute } from "./routes/health.js";
import { cameraRoutes } from "./routes/cameras.js";
import { snapRoutes } from "./routes/snap.js";
import { clipRoutes } from "./routes/clips.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  config: ServerConfig;
  /** Absolute media root; config.media.root resolved against the root path */
  mediaRoot: string;
  cameraSource: ClipSource;
  syncSource: ClipSource;
  /** Injected into throttles and snapshot settling */
  wait?: Sleep;
  now?: () => Date;
}

type ErrorStatus = 400 | 401 | 404 | 500 | 502;

const ERROR_STATUS: Record<string, ErrorStatus> = {
  INVALID_REQUEST: 400,
  AUTH_FAILED: 401,
  CAMERA_NOT_FOUND: 404,
  TRANSPORT_FAILED: 502,
  FILESYSTEM_ERROR: 500,
};

export function statusForError(err: ClipArchiveError): ErrorStatus {
  return ERROR_STATUS[err.errorCode] ?? 500;
}

export function createApp(deps: AppDeps): Hono {
  const { config, mediaRoot, logger } = deps;
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type"],
      allowMethods: ["GET", "POST", "OPTIONS"],
      maxAge: 86400,
    }),
  );

  const ingestDeps = { logger, wait: deps.wait, now: deps.now };
  const indexed = {
    mode: "indexed" as const,
    mediaRoot,
    fetchDelayMs: config.ingest.fetchDelayMs,
    retention: config.latest,
    perCameraArchive: config.media.perCameraArchive,
  };

  app.route("/", healthRoute({ version: deps.version, startedAt: deps.startedAt }));
  app.route("/", cameraRoutes({ source: deps.cameraSource }));
  app.route(
    "/",
    snapRoutes({
      logger,
      source: deps.cameraSource,
      wait: deps.wait,
      origin: config.server.origin,
      snapshot: {
        mediaRoot,
        lastImageFilename: config.media.lastImageFilename,
        settleDelayMs: config.snapshot.settleDelayMs,
      },
    }),
  );
  app.route(
    "/",
    clipRoutes({
      lookbackHours: config.ingest.lookbackHours,
      now: deps.now,
      pipelines: {
        flat: createIngestPipeline(
          { ...ingestDeps, source: deps.cameraSource },
          { mode: "flat", mediaRoot, fetchDelayMs: config.ingest.fetchDelayMs },
        ),
        indexed: createIngestPipeline({ ...ingestDeps, source: deps.cameraSource }, indexed),
        sync: createIngestPipeline({ ...ingestDeps, source: deps.syncSource }, indexed),
      },
    }),
  );

  // serveStatic resolves root against the working directory
  app.use(
    "/media/*",
    serveStatic({
      root: relative(process.cwd(), mediaRoot) || ".",
      rewriteRequestPath: (path) => path.replace(/^\/media/, ""),
    }),
  );

  app.onError((err, c) => {
    if (err instanceof ClipArchiveError) {
      logger.warn({ err }, err.message);
      return c.json(err.toJSON(), statusForError(err));
    }

    logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  app.notFound((c) => {
    return c.json(
      {
        error: {
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
