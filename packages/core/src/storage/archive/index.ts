export { buildArchivePath, partitionSegments } from "./paths.js";
export { createArchivePlacer } from "./placer.js";
export type {
  ArchivePlacer,
  ArchivePlacerOptions,
  PlaceResult,
} from "./placer.js";
