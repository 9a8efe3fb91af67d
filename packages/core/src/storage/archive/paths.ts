import { join } from "node:path";

/** Local-time calendar partition: ["2025", "06", "02"] */
export function partitionSegments(capturedAt: Date): [string, string, string] {
  return [
    String(capturedAt.getFullYear()),
    String(capturedAt.getMonth() + 1).padStart(2, "0"),
    String(capturedAt.getDate()).padStart(2, "0"),
  ];
}

/**
 * {mediaRoot}/[{camera}/]{YYYY}/{MM}/{DD}/{filename}
 *
 * The camera segment is omitted when `cameraName` is null.
 */
export function buildArchivePath(
  mediaRoot: string,
  cameraName: string | null,
  capturedAt: Date,
  filename: string,
): string {
  const cameraSegments = cameraName === null ? [] : [cameraName];
  return join(
    mediaRoot,
    ...cameraSegments,
    ...partitionSegments(capturedAt),
    filename,
  );
}
