/**
 * Session types for multi-device recordings.
 * A session is one coordinated recording run anchored by a single
 * timestamp and output directory.
 */

/** Recording topology: one device, or several coordinated devices */
export type RecordingMode = "standalone" | "sync";

export const RECORDING_MODES: readonly RecordingMode[] = ["standalone", "sync"];

/** Lifecycle state of a session. Finalized and aborted are terminal. */
export type SessionState = "active" | "finalized" | "aborted";

/** Any JSON-serializable value that can be stored as session metadata */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type SessionMetadata = Record<string, MetadataValue>;

/**
 * Read-only snapshot of the active session.
 */
export interface SessionInfo {
  /** Unique session ID (UUID), used by the session history */
  id: string;

  /** Canonical timestamp shared by every file of the session */
  timestamp: string;

  mode: RecordingMode;

  /** Base output directory the session directory lives under */
  baseDirectory: string;

  /** {baseDirectory}/{mode}/{timestamp} */
  sessionDirectory: string;

  /** Registered filenames, in registration order (duplicates kept) */
  filesCreated: string[];

  metadata: SessionMetadata;

  state: SessionState;

  /** When the session was created (ISO 8601) */
  createdAt: string;
}

/**
 * Persisted record written to {sessionDirectory}/session_info.json.
 * Keys are snake_case: this file is read by playback and audit tooling.
 */
export interface SessionManifest {
  schema_version: 1;
  session_id: string;
  timestamp: string;
  mode: RecordingMode;
  session_dir: string;
  files_created: string[];
  total_files: number;
  created_at: string;
  finalized_at: string;
  recording_config: {
    mode: RecordingMode;
    duration: number;
    base_output_dir: string;
  };
  device_names: {
    camera: Record<string, Record<string, string>>;
    audio: Record<string, string>;
  };
  metadata: SessionMetadata;
}

/** Marker left in a session directory that could not be removed by cleanup */
export interface AbortedSessionMarker {
  session_id: string;
  timestamp: string;
  mode: RecordingMode;
  session_dir: string;
  files_created: string[];
  aborted_at: string;
}

/** Outcome of a best-effort cleanup of a failed session */
export interface CleanupReport {
  /** False when there was no active session (no-op) */
  cleaned: boolean;
  removedFiles: string[];
  removedDirectory: boolean;
  markerWritten: boolean;
  /** One entry per cleanup step that failed */
  failures: string[];
}

/** Status of a session in the history store */
export type SessionHistoryStatus = "active" | "finalized" | "aborted";

/**
 * A session as recorded in the history database.
 */
export interface SessionRecord {
  id: string;
  timestamp: string;
  mode: RecordingMode;
  sessionDirectory: string;
  status: SessionHistoryStatus;
  fileCount: number;
  startedAt: string;
  endedAt: string | null;
  createdAt: string;
}
