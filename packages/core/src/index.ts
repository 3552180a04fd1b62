/**
 * @capture-session/core
 *
 * Session lifecycle, device naming and manifest writing for
 * multi-device depth camera and audio recordings.
 */

export * from "./types/index.js";
export * from "./errors.js";
export * from "./naming/index.js";
export * from "./session/index.js";
export * from "./db/index.js";
export {
  loadConfig,
  getDaemonUrl,
  getDefaultDbPath,
  getDefaultRecordingConfigPath,
  DEFAULT_LISTEN_PORT,
  type Config,
} from "./config.js";
export {
  recordingConfigSchema,
  getDefaultRecordingConfig,
  mergeConfig,
  parseRecordingConfig,
  loadRecordingConfig,
  writeDefaultRecordingConfig,
  snapshotRecordingConfig,
  type RecordingConfig,
} from "./recording-config.js";
export * from "./daemon-paths.js";
export * from "./lockfile.js";
export * from "./logger.js";
