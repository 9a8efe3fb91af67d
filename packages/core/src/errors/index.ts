export {
  ClipArchiveError,
  AuthError,
  TransportError,
  NotFoundError,
  FilesystemError,
  InvalidRequestError,
} from "./catalog.js";
