import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import type { Hono } from "hono";
import type { ServerConfig } from "@cliparchive/core/schemas";
import {
  DEFAULT_ROOT_PATH,
  resolveConfigPath,
  resolveRootPath,
} from "@cliparchive/core/config";
import { createLogger, type Logger } from "@cliparchive/core/logger";
import type { ClipSource } from "@cliparchive/core/source";
import {
  createBlinkClipSource,
  createBlinkSyncModuleSource,
  loadBlinkCredentials,
} from "@cliparchive/core/source/blink";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  rootPath: string;
  mediaRoot: string;
  credentialsPath: string;
}

export interface CreateServerOptions {
  rootPath?: string;
  logger?: Logger;
  /** Replace the Blink sources, e.g. with an in-memory source in tests */
  sources?: { camera: ClipSource; sync: ClipSource };
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const rootPath = resolveRootPath(options?.rootPath ?? DEFAULT_ROOT_PATH);
  const mediaRoot = resolveConfigPath(rootPath, config.media.root);
  const credentialsPath = resolveConfigPath(rootPath, config.blink.credentialsPath);

  await mkdir(mediaRoot, { recursive: true });

  // Credentials are read per session, so a missing file surfaces as AUTH_FAILED per request
  const loadCredentials = () => loadBlinkCredentials(credentialsPath);
  const sources = options?.sources ?? {
    camera: createBlinkClipSource({
      loadCredentials,
      maxMediaPages: config.blink.maxMediaPages,
    }),
    sync: createBlinkSyncModuleSource({
      loadCredentials,
      pollIntervalMs: config.ingest.manifestPollIntervalMs,
      pollAttempts: config.ingest.manifestPollAttempts,
    }),
  };

  logger.info({ mediaRoot, credentialsPath }, "Media archive ready");

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    config,
    mediaRoot,
    cameraSource: sources.camera,
    syncSource: sources.sync,
  });

  return { app, logger, config, startedAt, rootPath, mediaRoot, credentialsPath };
}
