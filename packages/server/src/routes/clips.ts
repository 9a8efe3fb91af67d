import { Hono, type Context } from "hono";
import { z } from "zod";
import {
  getSinceIso,
  parseSince,
  type IngestPipeline,
} from "@cliparchive/core/ingest";
import { CameraNameSchema, readBody } from "./body.js";

export interface ClipRouteDeps {
  lookbackHours: number;
  now?: () => Date;
  pipelines: {
    /** Downloads into {mediaRoot}/{camera} without an index */
    flat: IngestPipeline;
    /** Cloud clips through the index, archive, and latest view */
    indexed: IngestPipeline;
    /** Sync module local storage through the same index and archive */
    sync: IngestPipeline;
  };
}

const RecentBodySchema = z.object({
  camera_name: CameraNameSchema,
});

const SinceBodySchema = z.object({
  camera_name: CameraNameSchema,
  since: z.string().min(1).optional(),
});

export function clipRoutes(deps: ClipRouteDeps): Hono {
  const app = new Hono();
  const now = deps.now ?? (() => new Date());

  async function recent(c: Context, pipeline: IngestPipeline) {
    const body = await readBody(c, RecentBodySchema);
    const since = getSinceIso(deps.lookbackHours, now());
    const downloaded = await pipeline.run(body.camera_name, since);
    return c.json({ since, downloaded_clips: downloaded });
  }

  async function sinceCutoff(c: Context, pipeline: IngestPipeline) {
    const body = await readBody(c, SinceBodySchema);
    const since =
      body.since === undefined
        ? getSinceIso(deps.lookbackHours, now())
        : parseSince(body.since).toISOString();
    const downloaded = await pipeline.run(body.camera_name, since);
    return c.json({ since, downloaded_clips: downloaded });
  }

  // Lookback window from config
  app.post("/download-recent-clips", (c) => recent(c, deps.pipelines.flat));
  app.post("/download-recent-clips-and-sort", (c) => recent(c, deps.pipelines.indexed));
  app.post("/download-recent-sync-clips-and-sort", (c) => recent(c, deps.pipelines.sync));

  // Explicit cutoff in the body, lookback window when absent
  app.post("/download-clips-since", (c) => sinceCutoff(c, deps.pipelines.flat));
  app.post("/download-clips-since-and-sort", (c) => sinceCutoff(c, deps.pipelines.indexed));
  app.post("/download-sync-clips-since-and-sort", (c) => sinceCutoff(c, deps.pipelines.sync));

  return app;
}
