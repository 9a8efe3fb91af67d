import type { CameraInfo, CameraSelector, ClipRef } from "./types.js";

/**
 * Entry point to a remote camera service. One session is opened per
 * pipeline run and closed on every exit path.
 */
export interface ClipSource {
  /**
   * Authenticate and open a session.
   * @throws AuthError on missing or rejected credentials
   * @throws TransportError on network failure
   */
  openSession(): Promise<ClipSession>;
}

export interface ClipSession {
  listCameras(): Promise<CameraInfo[]>;

  /**
   * Clips created at or after `since`.
   * @param selector - camera name, or "all"
   */
  listClips(selector: CameraSelector, since: Date): Promise<ClipRef[]>;

  /**
   * Download clip bytes to `destPath`, overwriting. The file's mtime is set
   * to the clip's creation time. A failed transfer leaves nothing at
   * `destPath`.
   */
  fetch(clip: ClipRef, destPath: string): Promise<void>;

  /** Ask the camera to take a new still image. */
  requestSnapshot(camera: CameraInfo): Promise<void>;

  /** Download the camera's current thumbnail image to `destPath`. */
  fetchThumbnail(camera: CameraInfo, destPath: string): Promise<void>;

  /** Release transport resources. Later calls fail with TransportError. */
  close(): Promise<void>;
}
