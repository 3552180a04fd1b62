export { formatTimestamp, isSafePathSegment } from "./timestamp.js";
export {
  resolveDeviceName,
  fallbackDeviceName,
  isLoopbackHost,
  LOCAL_HOST_BUCKET,
  type DeviceNameTables,
} from "./device-names.js";
export {
  buildSessionPath,
  getManifestPath,
  getAbortedMarkerPath,
  MANIFEST_FILENAME,
  ABORTED_MARKER_FILENAME,
} from "./session-paths.js";
export {
  roleTag,
  buildCameraFilename,
  buildAudioFilename,
} from "./filenames.js";
