export {
  captureSnapshot,
  listCameras,
  type SnapshotDeps,
  type SnapshotOptions,
} from './snapshot.js'
