export {
  BlinkCredentialsSchema,
  loadBlinkCredentials,
  parseBlinkCredentials,
  restBaseUrl,
  type BlinkCredentials,
} from "./credentials.js";
export {
  createBlinkClient,
  camerasFromHomescreen,
  type BlinkClient,
  type BlinkClientOptions,
  type Homescreen,
} from "./client.js";
export { type CredentialsProvider } from "./session.js";
export {
  createBlinkClipSource,
  type BlinkClipSourceOptions,
} from "./camera-source.js";
export {
  createBlinkSyncModuleSource,
  type BlinkSyncModuleSourceOptions,
} from "./sync-source.js";
