export {
  createIngestPipeline,
  INDEX_DIRNAME,
  LATEST_DIRNAME,
  type FlatIngestOptions,
  type IndexedIngestOptions,
  type IngestDeps,
  type IngestOptions,
  type IngestPipeline,
  type IngestResult,
} from "./pipeline.js";
export { getSinceIso, parseSince } from "./since.js";
