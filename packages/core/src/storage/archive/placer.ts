import { mkdir, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, relative } from "node:path";
import { FilesystemError } from "../../errors/catalog.js";
import type { IndexStore } from "../index/store.js";
import { buildArchivePath } from "./paths.js";

export interface ArchivePlacerOptions {
  mediaRoot: string;
  indexStore: IndexStore;
  /** Put a {camera}/ directory above the date partition (default: true) */
  perCamera?: boolean;
}

export interface PlaceResult {
  path: string;
  relativePath: string;
  capturedAt: Date;
  sizeBytes: number;
}

export interface ArchivePlacer {
  /**
   * Move a staged clip into its date partition and mark it in the index.
   * On failure nothing is marked and the staged file is removed, so the
   * next run downloads the clip again.
   */
  place(stagedPath: string, cameraName: string): Promise<PlaceResult>;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createArchivePlacer(
  options: ArchivePlacerOptions,
): ArchivePlacer {
  const { mediaRoot, indexStore } = options;
  const perCamera = options.perCamera ?? true;

  async function fail(
    stagedPath: string,
    message: string,
    cause: unknown,
  ): Promise<never> {
    const details: Record<string, unknown> = {
      stagedPath,
      cause: describeError(cause),
    };
    try {
      await rm(stagedPath, { force: true });
    } catch (cleanupErr) {
      details.cleanupError = describeError(cleanupErr);
    }
    throw new FilesystemError(message, details);
  }

  return {
    async place(stagedPath, cameraName) {
      const filename = basename(stagedPath);

      let capturedAt: Date;
      let sizeBytes: number;
      try {
        // mtime of the download stands in for capture time
        const stats = await stat(stagedPath);
        capturedAt = stats.mtime;
        sizeBytes = stats.size;
      } catch (err) {
        throw new FilesystemError(`Staged clip is not readable: ${filename}`, {
          stagedPath,
          cause: describeError(err),
        });
      }

      const archivePath = buildArchivePath(
        mediaRoot,
        perCamera ? cameraName : null,
        capturedAt,
        filename,
      );

      try {
        await mkdir(dirname(archivePath), { recursive: true });
      } catch (err) {
        return fail(stagedPath, `Cannot create archive directory for ${filename}`, err);
      }

      try {
        await rename(stagedPath, archivePath);
      } catch (err) {
        return fail(stagedPath, `Cannot move ${filename} into the archive`, err);
      }

      try {
        await indexStore.mark(filename);
      } catch (err) {
        throw new FilesystemError(`Cannot write index marker for ${filename}`, {
          archivePath,
          cause: describeError(err),
        });
      }

      return {
        path: archivePath,
        relativePath: relative(mediaRoot, archivePath),
        capturedAt,
        sizeBytes,
      };
    },
  };
}
