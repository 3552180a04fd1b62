export {
  RecordingSessionManager,
  type CreateSessionOptions,
  type RecordingSessionManagerOptions,
} from "./manager.js";
export {
  buildManifest,
  writeManifest,
  readManifest,
  MANIFEST_SCHEMA_VERSION,
} from "./manifest.js";
export { planDevices, countPlannedDevices } from "./plan.js";
export type { SessionHistory, SessionEndStatus } from "./history.js";
