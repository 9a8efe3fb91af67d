export { ALL_CAMERAS } from "./types.js";
export type {
  CameraInfo,
  CameraSelector,
  CameraType,
  ClipRef,
} from "./types.js";
export type { ClipSource, ClipSession } from "./interface.js";
export {
  clipFilename,
  vendorClipFilename,
  slugify,
  isClipOfCamera,
} from "./naming.js";
export { throttleFetches, sleep, type Sleep } from "./throttle.js";
export { writeClipFile } from "./files.js";
