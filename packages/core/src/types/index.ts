export type {
  RecordingMode,
  SessionState,
  MetadataValue,
  SessionMetadata,
  SessionInfo,
  SessionManifest,
  AbortedSessionMarker,
  CleanupReport,
  SessionHistoryStatus,
  SessionRecord,
} from "./session.js";
export { RECORDING_MODES } from "./session.js";

export type {
  DeviceClass,
  CameraRole,
  RoleTag,
  CameraDescriptor,
  AudioDescriptor,
  DeviceDescriptor,
  PlannedDevice,
} from "./device.js";
export { CAMERA_ROLES } from "./device.js";
