import { Hono } from "hono";
import { z } from "zod";
import { captureSnapshot, type SnapshotOptions } from "@cliparchive/core/snapshot";
import type { ClipSource, Sleep } from "@cliparchive/core/source";
import type { Logger } from "pino";
import { readBody } from "./body.js";

export interface SnapRouteDeps {
  logger: Logger;
  source: ClipSource;
  wait?: Sleep;
  /** Public origin used to build the image URL */
  origin: string;
  snapshot: SnapshotOptions;
}

const SnapBodySchema = z.object({
  camera_name: z.string().min(1),
});

export function snapRoutes(deps: SnapRouteDeps): Hono {
  const app = new Hono();

  // POST /snap: take a new still and return where it is served
  app.post("/snap", async (c) => {
    const body = await readBody(c, SnapBodySchema);
    const camera = body.camera_name;

    await captureSnapshot(
      { source: deps.source, logger: deps.logger, wait: deps.wait },
      deps.snapshot,
      camera,
    );

    const origin = deps.origin.replace(/\/+$/, "");
    const url = `${origin}/media/${encodeURIComponent(camera)}/${encodeURIComponent(deps.snapshot.lastImageFilename)}`;
    return c.json({ url });
  });

  return app;
}
