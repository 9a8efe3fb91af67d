import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, utimes, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { FilesystemError } from "../errors/catalog.js";
import { TEMP_INFIX } from "../storage/index/store.js";

/**
 * Atomic write: mkdir -p, write temp file, set mtime, rename.
 * A failure removes the temp file and leaves `destPath` untouched.
 */
export async function writeClipFile(
  destPath: string,
  data: Uint8Array,
  mtime?: Date,
): Promise<void> {
  const tempPath = destPath + TEMP_INFIX + randomUUID();
  try {
    await mkdir(dirname(destPath), { recursive: true });
    await writeFile(tempPath, data);
    if (mtime) {
      await utimes(tempPath, mtime, mtime);
    }
    await rename(tempPath, destPath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw new FilesystemError(`Cannot write ${destPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}
