/** Sentinel selector meaning every camera on the account. */
export const ALL_CAMERAS = "all";

/** A camera name, or "all". */
export type CameraSelector = string;

export type CameraType = "camera" | "owl" | "doorbell";

export interface CameraInfo {
  id: string;
  name: string;
  networkId: string;
  type: CameraType;
  /** Vendor thumbnail path, refreshed after a snapshot */
  thumbnail: string | null;
  /** Raw vendor attributes, passed through to API callers */
  attributes: Record<string, unknown>;
}

/** A remote clip. Immutable once created upstream. */
export interface ClipRef {
  id: string;
  cameraName: string;
  createdAt: string; // ISO 8601
  mediaUrl: string;
  networkId?: string;
}
