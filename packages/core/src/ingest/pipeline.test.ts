import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rm,
  stat,
  utimes,
  writeFile,
} from "node:fs/promises";
import { join, relative } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import {
  FilesystemError,
  InvalidRequestError,
  NotFoundError,
  TransportError,
} from "../errors/catalog.js";
import { clipFilename, vendorClipFilename } from "../source/naming.js";
import {
  createFakeClipSource,
  fakeCamera,
  fakeClip,
  type FakeClipSource,
} from "../test-utils/index.js";
import {
  createIngestPipeline,
  type IndexedIngestOptions,
} from "./pipeline.js";

const logger = pino({ level: "silent" });

/** Local-time ISO string, so date partitions do not depend on the test host's zone. */
function localIso(year: number, month: number, day: number, hour: number): string {
  return new Date(year, month - 1, day, hour, 0, 0).toISOString();
}

/** Relative path → file contents for everything under `root`. */
async function readTree(root: string): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  async function walk(dir: string): Promise<void> {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(path);
      } else {
        tree[relative(root, path)] = await readFile(path, "utf-8");
      }
    }
  }
  await walk(root);
  return tree;
}

describe("createIngestPipeline (indexed)", () => {
  let mediaRoot: string;
  let source: FakeClipSource;
  const wait = vi.fn(async (_ms: number) => {});
  const since = "2025-06-01T00:00:00Z";

  const porchClips = [
    fakeClip("porch", localIso(2025, 6, 2, 9)),
    fakeClip("porch", localIso(2025, 6, 2, 10)),
    fakeClip("porch", localIso(2025, 6, 2, 11)),
  ];

  function options(overrides: Partial<IndexedIngestOptions> = {}): IndexedIngestOptions {
    return {
      mode: "indexed",
      mediaRoot,
      fetchDelayMs: 2_000,
      retention: { maxAgeHours: 0, maxCount: 20 },
      ...overrides,
    };
  }

  function pipeline(overrides: Partial<IndexedIngestOptions> = {}) {
    return createIngestPipeline({ source, logger, wait }, options(overrides));
  }

  function stagingDir(): string {
    return join(mediaRoot, ".idx", ".staging");
  }

  function archivePath(camera: string, createdAt: string): string {
    return join(mediaRoot, camera, "2025", "06", "02", clipFilename({ cameraName: camera, createdAt }));
  }

  beforeEach(async () => {
    mediaRoot = await mkdtemp(join(tmpdir(), "ingest-pipeline-test-"));
    source = createFakeClipSource({
      cameras: [fakeCamera("porch"), fakeCamera("garage")],
      clips: [...porchClips],
    });
    wait.mockClear();
  });

  afterEach(async () => {
    await rm(mediaRoot, { recursive: true, force: true });
  });

  it("archives three new porch clips and mirrors them into latest", async () => {
    const result = await pipeline().run("all", since);

    expect(result).toEqual({
      all: porchClips.map((clip) => archivePath("porch", clip.createdAt)),
    });

    const latest = (await readdir(join(mediaRoot, "latest"))).sort();
    expect(latest).toEqual(porchClips.map((clip) => clipFilename(clip)));
    for (const clip of porchClips) {
      const mirrored = await readFile(join(mediaRoot, "latest", clipFilename(clip)), "utf-8");
      expect(mirrored).toBe(await readFile(archivePath("porch", clip.createdAt), "utf-8"));
      expect(mirrored).toBe(`clip:${clip.id}`);
    }
  });

  it("returns an empty list on a second run and leaves the tree unchanged", async () => {
    await pipeline().run("all", since);
    const before = await readTree(mediaRoot);

    const result = await pipeline().run("all", since);

    expect(result).toEqual({ all: [] });
    expect(await readTree(mediaRoot)).toEqual(before);
    expect(source.calls.fetched).toHaveLength(3);
  });

  it("never refetches an indexed clip, even when since moves", async () => {
    await pipeline().run("porch", since);

    source.clips.push(fakeClip("porch", localIso(2025, 6, 2, 12)));
    const result = await pipeline().run("porch", "2020-01-01T00:00:00Z");

    expect(result.porch).toEqual([archivePath("porch", localIso(2025, 6, 2, 12))]);
    expect(source.calls.fetched).toHaveLength(4);
  });

  it("places clips by the local date of their mtime", async () => {
    const createdAt = localIso(2025, 12, 31, 23);
    source.clips = [fakeClip("garage", createdAt)];

    const result = await pipeline().run("garage", since);

    const filename = clipFilename({ cameraName: "garage", createdAt });
    expect(result.garage).toEqual([join(mediaRoot, "garage", "2025", "12", "31", filename)]);
  });

  it("omits the camera directory when perCameraArchive is off", async () => {
    source.clips = [porchClips[0]];

    const result = await pipeline({ perCameraArchive: false }).run("porch", since);

    expect(result.porch).toEqual([
      join(mediaRoot, "2025", "06", "02", clipFilename(porchClips[0])),
    ]);
  });

  it("writes a zero-byte marker for every archived clip", async () => {
    await pipeline().run("porch", since);

    const idx = join(mediaRoot, ".idx");
    const markers = (await readdir(idx, { withFileTypes: true }))
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
    expect(markers).toEqual(porchClips.map((clip) => clipFilename(clip)));
    for (const name of markers) {
      expect((await stat(join(idx, name))).size).toBe(0);
    }
    expect(await readdir(join(idx, ".staging"))).toEqual([]);
  });

  it("logs each archived clip with its capture time", async () => {
    source.clips = [porchClips[0]];
    const info = vi.spyOn(logger, "info");

    try {
      await pipeline().run("porch", since);

      expect(info).toHaveBeenCalledWith(
        {
          cameraName: "porch",
          path: join("porch", "2025", "06", "02", clipFilename(porchClips[0])),
          capturedAt: porchClips[0].createdAt,
          sizeBytes: `clip:${porchClips[0].id}`.length,
        },
        "Archived clip",
      );
    } finally {
      info.mockRestore();
    }
  });

  it("keys results by each requested selector", async () => {
    source.clips.push(fakeClip("garage", localIso(2025, 6, 2, 8)));

    const result = await pipeline().run(["garage", "porch"], since);

    expect(Object.keys(result)).toEqual(["garage", "porch"]);
    expect(result.garage).toEqual([archivePath("garage", localIso(2025, 6, 2, 8))]);
    expect(result.porch).toHaveLength(3);
  });

  it("ignores clips older than since", async () => {
    const result = await pipeline().run("porch", localIso(2025, 6, 2, 10));

    expect(result.porch).toEqual([
      archivePath("porch", porchClips[1].createdAt),
      archivePath("porch", porchClips[2].createdAt),
    ]);
  });

  it("spaces fetches by fetchDelayMs", async () => {
    await pipeline().run("porch", since);

    expect(wait).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledWith(2_000);
  });

  it("rejects an unknown camera before fetching anything", async () => {
    await expect(pipeline().run(["porch", "attic"], since)).rejects.toThrow(NotFoundError);

    expect(source.calls.fetched).toEqual([]);
    expect(source.calls.closed).toBe(1);
    await expect(stat(join(mediaRoot, ".idx"))).rejects.toThrow(/ENOENT/);
  });

  it("rejects an invalid since without opening a session", async () => {
    await expect(pipeline().run("all", "not-a-date")).rejects.toThrow(InvalidRequestError);
    expect(source.calls.opened).toBe(0);
  });

  it("rejects an empty selector list", async () => {
    await expect(pipeline().run([], since)).rejects.toThrow(InvalidRequestError);
  });

  it("closes the session and marks nothing when a fetch fails", async () => {
    const failing = createFakeClipSource({
      cameras: [fakeCamera("porch")],
      clips: [...porchClips],
      failFetch: (clip) =>
        clip.id === porchClips[1].id ? new TransportError("Blink error: 503") : undefined,
    });
    const run = createIngestPipeline({ source: failing, logger, wait }, options());

    await expect(run.run("porch", since)).rejects.toThrow("Blink error: 503");

    expect(failing.calls.closed).toBe(1);
    // the first clip was downloaded but never placed
    expect(await readdir(join(mediaRoot, ".idx", ".staging"))).toEqual([
      clipFilename(porchClips[0]),
    ]);
    await expect(stat(join(mediaRoot, ".idx", clipFilename(porchClips[0])))).rejects.toThrow(
      /ENOENT/,
    );
    await expect(stat(join(mediaRoot, "porch"))).rejects.toThrow(/ENOENT/);
  });

  it("places clips staged by an interrupted run", async () => {
    const staged = porchClips[0];
    const stagedPath = join(stagingDir(), clipFilename(staged));
    await mkdir(stagingDir(), { recursive: true });
    await writeFile(stagedPath, "staged-bytes");
    const mtime = new Date(staged.createdAt);
    await utimes(stagedPath, mtime, mtime);
    source.clips = [staged];

    const result = await pipeline().run("porch", since);

    expect(result.porch).toEqual([archivePath("porch", staged.createdAt)]);
    expect(source.calls.fetched).toEqual([]);
    expect(await readFile(archivePath("porch", staged.createdAt), "utf-8")).toBe("staged-bytes");
    await expect(stat(stagedPath)).rejects.toThrow(/ENOENT/);
    expect((await stat(join(mediaRoot, ".idx", clipFilename(staged)))).size).toBe(0);
  });

  it("archives an empty clip left staged by a failed run", async () => {
    const empty = { ...fakeClip("porch", localIso(2025, 6, 2, 9)), content: "" };
    const next = fakeClip("porch", localIso(2025, 6, 2, 10));
    let nextAttempts = 0;
    const flaky = createFakeClipSource({
      cameras: [fakeCamera("porch")],
      clips: [empty, next],
      failFetch: (clip) =>
        clip.id === next.id && nextAttempts++ === 0
          ? new TransportError("Blink error: 503")
          : undefined,
    });
    const run = createIngestPipeline({ source: flaky, logger, wait }, options());

    await expect(run.run("porch", since)).rejects.toThrow("Blink error: 503");
    const result = await run.run("porch", since);

    expect(result.porch).toEqual([
      archivePath("porch", empty.createdAt),
      archivePath("porch", next.createdAt),
    ]);
    expect(flaky.calls.fetched).toEqual([empty.id, next.id]);
    expect(await readFile(archivePath("porch", empty.createdAt), "utf-8")).toBe("");
    expect((await readdir(join(mediaRoot, "latest"))).sort()).toEqual([
      clipFilename(empty),
      clipFilename(next),
    ]);
    expect((await stat(join(mediaRoot, ".idx", clipFilename(empty)))).size).toBe(0);
    expect(await readdir(stagingDir())).toEqual([]);
  });

  it("leaves another camera's staged clip for that camera's turn", async () => {
    const garageClip = fakeClip("garage", localIso(2025, 6, 2, 7));
    const stagedPath = join(stagingDir(), clipFilename(garageClip));
    await mkdir(stagingDir(), { recursive: true });
    await writeFile(stagedPath, "garage-bytes");
    const mtime = new Date(garageClip.createdAt);
    await utimes(stagedPath, mtime, mtime);

    const result = await pipeline().run("porch", since);

    expect(result.porch).toHaveLength(3);
    expect(await readFile(stagedPath, "utf-8")).toBe("garage-bytes");
  });

  it("keeps the newest maxCount entries in latest", async () => {
    const result = await pipeline({ retention: { maxAgeHours: 0, maxCount: 2 } }).run("porch", since);

    expect(result.porch).toHaveLength(3);
    expect((await readdir(join(mediaRoot, "latest"))).sort()).toEqual([
      clipFilename(porchClips[1]),
      clipFilename(porchClips[2]),
    ]);
  });

  it("drops latest entries older than maxAgeHours", async () => {
    const latestDir = join(mediaRoot, "latest");
    await mkdir(latestDir, { recursive: true });
    const stale = join(latestDir, "porch_2025-05-01T00-00-00.000Z.mp4");
    await writeFile(stale, "old");
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await utimes(stale, twoDaysAgo, twoDaysAgo);

    await pipeline({ retention: { maxAgeHours: 24, maxCount: 0 } }).run("porch", since);

    expect((await readdir(latestDir)).sort()).toEqual(
      porchClips.map((clip) => clipFilename(clip)),
    );
  });

  it("wraps a failed mirror in FilesystemError", async () => {
    // a directory where the mirror copy should go makes copyFile fail
    await mkdir(join(mediaRoot, "latest", clipFilename(porchClips[0])), { recursive: true });
    source.clips = [porchClips[0]];

    await expect(pipeline().run("porch", since)).rejects.toThrow(FilesystemError);
    expect(source.calls.closed).toBe(1);
  });
});

describe("createIngestPipeline (flat)", () => {
  let mediaRoot: string;
  let source: FakeClipSource;
  const since = "2025-06-01T00:00:00Z";
  const clips = [
    fakeClip("Porch", "2025-06-02T12:00:00+00:00"),
    fakeClip("Garage", "2025-06-02T13:00:00+00:00"),
  ];

  function pipeline() {
    return createIngestPipeline(
      { source, logger, wait: async () => {} },
      { mode: "flat", mediaRoot, fetchDelayMs: 0 },
    );
  }

  beforeEach(async () => {
    mediaRoot = await mkdtemp(join(tmpdir(), "ingest-flat-test-"));
    source = createFakeClipSource({
      cameras: [fakeCamera("Porch"), fakeCamera("Garage")],
      clips: [...clips],
    });
  });

  afterEach(async () => {
    await rm(mediaRoot, { recursive: true, force: true });
  });

  it("downloads every camera into the all folder with vendor filenames", async () => {
    const result = await pipeline().run("all", since);

    expect(result).toEqual({
      all: [
        join(mediaRoot, "all", "garage-2025-06-02t13-00-00-00-00.mp4"),
        join(mediaRoot, "all", "porch-2025-06-02t12-00-00-00-00.mp4"),
      ],
    });
    expect(vendorClipFilename(clips[0])).toBe("porch-2025-06-02t12-00-00-00-00.mp4");
  });

  it("downloads one camera into its own folder", async () => {
    const result = await pipeline().run("Porch", since);

    expect(result).toEqual({
      Porch: [join(mediaRoot, "Porch", "porch-2025-06-02t12-00-00-00-00.mp4")],
    });
  });

  it("skips files already present and writes no index or latest view", async () => {
    await pipeline().run("all", since);

    const result = await pipeline().run("all", since);

    expect(result).toEqual({ all: [] });
    expect(source.calls.fetched).toHaveLength(2);
    expect((await readdir(mediaRoot)).sort()).toEqual(["all"]);
  });
});
