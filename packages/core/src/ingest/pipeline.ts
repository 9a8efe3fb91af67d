import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import {
  FilesystemError,
  InvalidRequestError,
  NotFoundError,
} from "../errors/catalog.js";
import type { RetentionPolicy } from "../schemas/server-config.js";
import { createArchivePlacer } from "../storage/archive/placer.js";
import {
  createIndexStore,
  diffListings,
  isTempName,
  type IndexStore,
} from "../storage/index/store.js";
import { createLatestView } from "../storage/latest/manager.js";
import type { ClipSession, ClipSource } from "../source/interface.js";
import {
  clipFilename,
  isClipOfCamera,
  vendorClipFilename,
} from "../source/naming.js";
import { sleep, throttleFetches, type Sleep } from "../source/throttle.js";
import { ALL_CAMERAS, type CameraSelector } from "../source/types.js";
import { parseSince } from "./since.js";

export const INDEX_DIRNAME = ".idx";
export const LATEST_DIRNAME = "latest";

export interface IngestDeps {
  source: ClipSource;
  logger: Logger;
  /** Injected for the fetch throttle */
  wait?: Sleep;
  /** Clock used by age retention */
  now?: () => Date;
}

export interface IndexedIngestOptions {
  mode: "indexed";
  mediaRoot: string;
  fetchDelayMs: number;
  retention: RetentionPolicy;
  /** Partition under {camera}/ (default: true) */
  perCameraArchive?: boolean;
}

export interface FlatIngestOptions {
  mode: "flat";
  mediaRoot: string;
  fetchDelayMs: number;
}

export type IngestOptions = IndexedIngestOptions | FlatIngestOptions;

/** Archive paths of newly ingested clips, keyed by the selector as requested. */
export type IngestResult = Record<string, string[]>;

export interface IngestPipeline {
  run(
    selectors: CameraSelector | CameraSelector[],
    since: Date | string,
  ): Promise<IngestResult>;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Regular files in `dir`, ignoring in-progress temp files. Missing dir is empty. */
async function listFiles(dir: string): Promise<Set<string>> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return new Set();
    }
    throw err;
  }

  const files = new Set<string>();
  for (const name of names) {
    if (isTempName(name)) continue;
    if ((await stat(join(dir, name))).isFile()) {
      files.add(name);
    }
  }
  return files;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

/**
 * Ingestion run over one source session:
 * 1. OPEN the session, throttled
 * 2. RESOLVE selectors against the camera list (unknown camera fails here, before any fetch)
 * 3. FETCH per camera into staging, diffing the index before and after
 * 4. PLACE each new clip into the archive and MIRROR it into latest/
 * 5. PRUNE latest/ once
 * 6. CLOSE the session on every exit path
 *
 * Flat mode skips the index, placement, and latest view and downloads
 * straight into {mediaRoot}/{selector}.
 */
export function createIngestPipeline(
  deps: IngestDeps,
  options: IngestOptions,
): IngestPipeline {
  const { source, logger } = deps;
  const wait = deps.wait ?? sleep;
  const now = deps.now ?? (() => new Date());

  async function resolve(
    session: ClipSession,
    selectors: CameraSelector[],
  ): Promise<Map<CameraSelector, string[]>> {
    const known = [...new Set((await session.listCameras()).map((c) => c.name))];
    const resolved = new Map<CameraSelector, string[]>();
    for (const selector of selectors) {
      if (selector === ALL_CAMERAS) {
        resolved.set(selector, known);
      } else if (known.includes(selector)) {
        resolved.set(selector, [selector]);
      } else {
        throw new NotFoundError(selector);
      }
    }
    return resolved;
  }

  async function ingestCamera(
    session: ClipSession,
    indexStore: IndexStore,
    cameraName: string,
    since: Date,
  ): Promise<string[]> {
    // Staged leftovers from an interrupted run count as new so they get placed
    const staged = await indexStore.listStaged();
    const before = await indexStore.list();
    for (const name of staged) {
      if (isClipOfCamera(name, cameraName)) {
        before.delete(name);
        logger.info({ cameraName, filename: name }, "Recovering staged clip");
      }
    }

    const clips = await session.listClips(cameraName, since);
    logger.debug({ cameraName, count: clips.length }, "Listed clips");

    for (const clip of clips) {
      const filename = clipFilename(clip);
      if (await indexStore.exists(filename)) {
        logger.debug({ cameraName, filename }, "Clip already indexed, skipping");
        continue;
      }
      await session.fetch(clip, indexStore.stagingPath(filename));
      logger.debug({ cameraName, filename }, "Fetched clip");
    }

    const after = await indexStore.list();
    return diffListings(before, after);
  }

  async function runIndexed(
    session: ClipSession,
    opts: IndexedIngestOptions,
    resolved: Map<CameraSelector, string[]>,
    since: Date,
  ): Promise<IngestResult> {
    const indexStore = createIndexStore({
      indexDir: join(opts.mediaRoot, INDEX_DIRNAME),
    });
    const placer = createArchivePlacer({
      mediaRoot: opts.mediaRoot,
      indexStore,
      perCamera: opts.perCameraArchive ?? true,
    });
    const latest = createLatestView({
      latestDir: join(opts.mediaRoot, LATEST_DIRNAME),
    });

    const result: IngestResult = {};
    for (const [selector, cameras] of resolved) {
      const archived: string[] = [];
      for (const cameraName of cameras) {
        logger.debug({ cameraName, phase: "fetch" }, "Ingest phase");
        const fresh = await ingestCamera(session, indexStore, cameraName, since);

        logger.debug({ cameraName, phase: "place", count: fresh.length }, "Ingest phase");
        for (const filename of fresh) {
          const placed = await placer.place(indexStore.stagingPath(filename), cameraName);
          try {
            await latest.mirror(placed.path);
          } catch (err) {
            throw new FilesystemError(`Cannot mirror ${filename} into latest`, {
              archivePath: placed.path,
              cause: describeError(err),
            });
          }
          archived.push(placed.path);
          logger.info(
            {
              cameraName,
              path: placed.relativePath,
              capturedAt: placed.capturedAt.toISOString(),
              sizeBytes: placed.sizeBytes,
            },
            "Archived clip",
          );
        }
      }
      result[selector] = archived;
    }

    logger.debug({ phase: "prune" }, "Ingest phase");
    try {
      const removed = await latest.prune(opts.retention, now());
      if (removed.length > 0) {
        logger.info({ removed: removed.length }, "Pruned latest view");
      }
    } catch (err) {
      throw new FilesystemError("Cannot prune latest view", {
        cause: describeError(err),
      });
    }

    return result;
  }

  async function runFlat(
    session: ClipSession,
    opts: FlatIngestOptions,
    resolved: Map<CameraSelector, string[]>,
    since: Date,
  ): Promise<IngestResult> {
    const result: IngestResult = {};
    for (const selector of resolved.keys()) {
      const dir = join(opts.mediaRoot, selector);
      const before = await listFiles(dir);

      const clips = await session.listClips(selector, since);
      for (const clip of clips) {
        const dest = join(dir, vendorClipFilename(clip));
        if (await fileExists(dest)) {
          logger.debug({ selector, path: dest }, "Clip already downloaded, skipping");
          continue;
        }
        await session.fetch(clip, dest);
        logger.info({ selector, path: dest }, "Downloaded clip");
      }

      const after = await listFiles(dir);
      result[selector] = diffListings(before, after).map((name) => join(dir, name));
    }
    return result;
  }

  return {
    async run(selectorInput, sinceInput) {
      const selectors = Array.isArray(selectorInput) ? selectorInput : [selectorInput];
      if (selectors.length === 0) {
        throw new InvalidRequestError("At least one camera selector is required");
      }
      const since = parseSince(sinceInput);

      logger.debug({ phase: "open", mode: options.mode }, "Ingest phase");
      const session = throttleFetches(
        await source.openSession(),
        options.fetchDelayMs,
        wait,
      );

      try {
        logger.debug({ phase: "resolve", selectors }, "Ingest phase");
        const resolved = await resolve(session, selectors);

        const result =
          options.mode === "indexed"
            ? await runIndexed(session, options, resolved, since)
            : await runFlat(session, options, resolved, since);

        logger.info(
          {
            mode: options.mode,
            since: since.toISOString(),
            clips: Object.values(result).reduce((n, paths) => n + paths.length, 0),
          },
          "Ingest run complete",
        );
        return result;
      } finally {
        logger.debug({ phase: "close" }, "Ingest phase");
        await session.close();
      }
    },
  };
}
