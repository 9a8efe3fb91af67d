import type { ClipRef } from "./types.js";

/** "porch" + "2025-06-02T12:00:00Z" → "porch_2025-06-02T12-00-00Z.mp4" */
export function clipFilename(clip: Pick<ClipRef, "cameraName" | "createdAt">): string {
  return `${clip.cameraName}_${clip.createdAt.replace(/:/g, "-")}.mp4`;
}

/** Lower-case, runs of anything outside [a-z0-9] become "-", trimmed. */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Filename used by flat downloads, matching the vendor tooling:
 * "Porch" + "2025-06-02T12:00:00+00:00" → "porch-2025-06-02t12-00-00-00-00.mp4"
 */
export function vendorClipFilename(
  clip: Pick<ClipRef, "cameraName" | "createdAt">,
): string {
  return `${slugify(`${clip.cameraName}-${clip.createdAt}`)}.mp4`;
}

/**
 * Whether an index entry name was produced by clipFilename for this camera.
 * The timestamp after the underscore keeps "porch" from matching "porch_2".
 */
export function isClipOfCamera(filename: string, cameraName: string): boolean {
  if (!filename.startsWith(`${cameraName}_`)) return false;
  return /^\d{4}-\d{2}-\d{2}T/.test(filename.slice(cameraName.length + 1));
}
