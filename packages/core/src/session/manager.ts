/**
 * Recording session lifecycle manager.
 *
 * Owns the single active session of a recording run:
 *   no session -> active -> finalized | aborted
 * Capture processes are started and monitored elsewhere; they ask this
 * manager for canonical filenames before they start and report produced
 * files back through registerFile() when they finish.
 *
 * Every operation is synchronous, so each one runs to completion on the
 * event loop before the next is handled. The owning process (the daemon)
 * must be the only writer of its session directories.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import {
  CAMERA_ROLES,
  RECORDING_MODES,
  type AbortedSessionMarker,
  type CameraRole,
  type CleanupReport,
  type DeviceDescriptor,
  type PlannedDevice,
  type RecordingMode,
  type SessionInfo,
  type SessionManifest,
  type SessionMetadata,
} from "../types/index.js";
import {
  getDefaultRecordingConfig,
  snapshotRecordingConfig,
  type RecordingConfig,
} from "../recording-config.js";
import { SessionError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import {
  buildAudioFilename,
  buildCameraFilename,
  buildSessionPath,
  formatTimestamp,
  getAbortedMarkerPath,
  isSafePathSegment,
  resolveDeviceName,
} from "../naming/index.js";
import { buildManifest, writeManifest } from "./manifest.js";
import { countPlannedDevices, planDevices } from "./plan.js";
import type { SessionEndStatus, SessionHistory } from "./history.js";

export interface CreateSessionOptions {
  /** Use this timestamp instead of formatting the current time */
  timestamp?: string;
  /** Override the configured recording mode */
  mode?: RecordingMode;
}

export interface RecordingSessionManagerOptions {
  /** Configuration used by sessions created from now on (default: built-in defaults) */
  config?: RecordingConfig;
  history?: SessionHistory;
  logger?: Logger;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/** Mutable state of the active session, never handed out directly */
interface ActiveSession {
  id: string;
  timestamp: string;
  mode: RecordingMode;
  baseDirectory: string;
  sessionDirectory: string;
  filesCreated: string[];
  metadata: SessionMetadata;
  createdAt: string;
  /** Configuration snapshot taken at creation */
  config: RecordingConfig;
}

function toInfo(session: ActiveSession): SessionInfo {
  return {
    id: session.id,
    timestamp: session.timestamp,
    mode: session.mode,
    baseDirectory: session.baseDirectory,
    sessionDirectory: session.sessionDirectory,
    filesCreated: [...session.filesCreated],
    metadata: structuredClone(session.metadata),
    state: "active",
    createdAt: session.createdAt,
  };
}

function assertDeviceIndex(deviceIndex: number): void {
  if (!Number.isInteger(deviceIndex) || deviceIndex < 0) {
    throw new SessionError(
      "INVALID_ARGUMENT",
      `Device index must be a non-negative integer, got ${deviceIndex}`
    );
  }
}

export class RecordingSessionManager {
  private config: RecordingConfig;
  private active: ActiveSession | null = null;
  private readonly history: SessionHistory | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RecordingSessionManagerOptions = {}) {
    this.config = options.config ?? getDefaultRecordingConfig();
    this.history = options.history;
    this.logger = options.logger ?? createLogger("Session");
    this.now = options.now ?? (() => new Date());
  }

  /** Configuration that the next session will snapshot */
  getConfiguration(): RecordingConfig {
    return this.config;
  }

  /**
   * Replace the configuration for future sessions.
   * The active session keeps the snapshot it was created with.
   */
  setConfiguration(config: RecordingConfig): void {
    this.config = config;
  }

  hasActiveSession(): boolean {
    return this.active !== null;
  }

  /**
   * Start a new session and create its directory.
   *
   * @throws SessionError ALREADY_ACTIVE if a session is active
   * @throws SessionError INVALID_ARGUMENT for an unusable timestamp or mode
   * @throws SessionError DIRECTORY_CREATION_FAILED if the directory cannot be
   *   created
   */
  createSession(options: CreateSessionOptions = {}): SessionInfo {
    if (this.active) {
      throw new SessionError(
        "ALREADY_ACTIVE",
        `A recording session is already active (${this.active.timestamp}); finalize or clean it up before creating another`
      );
    }

    const config = snapshotRecordingConfig(this.config);
    const mode = options.mode ?? config.recording.mode;
    if (!RECORDING_MODES.includes(mode)) {
      throw new SessionError(
        "INVALID_ARGUMENT",
        `Unknown recording mode "${String(mode)}" (expected standalone or sync)`
      );
    }

    const createdAt = this.now();
    const timestamp =
      options.timestamp ??
      formatTimestamp(config.recording.timestamp_format, createdAt);
    if (!isSafePathSegment(timestamp)) {
      throw new SessionError(
        "INVALID_ARGUMENT",
        `Session timestamp "${timestamp}" cannot be used as a directory name`
      );
    }

    const baseDirectory = path.resolve(config.recording.base_output_dir);
    const sessionDirectory = buildSessionPath(mode, timestamp, baseDirectory);
    this.prepareDirectory(sessionDirectory);

    const session: ActiveSession = {
      id: randomUUID(),
      timestamp,
      mode,
      baseDirectory,
      sessionDirectory,
      filesCreated: [],
      metadata: {
        created_at: createdAt.toISOString(),
        duration: config.recording.duration,
        device_count: countPlannedDevices(config, mode),
      },
      createdAt: createdAt.toISOString(),
      config,
    };
    this.active = session;

    const info = toInfo(session);
    this.notifyHistory("recordStarted", () => this.history?.recordStarted(info));
    this.logger.info(`Session created: ${sessionDirectory} (${mode})`);
    return info;
  }

  /** Snapshot of the active session, or null when there is none */
  getCurrentSessionInfo(): SessionInfo | null {
    return this.active ? toInfo(this.active) : null;
  }

  /**
   * Canonical filename for a camera of the active session.
   * Does not register the file.
   *
   * @throws SessionError INVALID_STATE without an active session
   */
  generateCameraFilename(
    role: CameraRole,
    hostIdentifier: string,
    deviceIndex: number
  ): string {
    const session = this.requireActive("generate a camera filename");
    if (!CAMERA_ROLES.includes(role)) {
      throw new SessionError(
        "INVALID_ARGUMENT",
        `Unknown camera role "${String(role)}"`
      );
    }
    assertDeviceIndex(deviceIndex);

    const friendlyName = resolveDeviceName(
      "camera",
      hostIdentifier,
      deviceIndex,
      session.config
    );
    return buildCameraFilename(
      session.timestamp,
      role,
      friendlyName,
      session.config.camera.extension
    );
  }

  /**
   * Canonical filename for an audio device of the active session.
   * Does not register the file.
   *
   * @throws SessionError INVALID_STATE without an active session
   */
  generateAudioFilename(deviceIndex: number): string {
    const session = this.requireActive("generate an audio filename");
    assertDeviceIndex(deviceIndex);

    const friendlyName = resolveDeviceName(
      "audio",
      "",
      deviceIndex,
      session.config
    );
    return buildAudioFilename(
      session.timestamp,
      friendlyName,
      session.config.audio.extension
    );
  }

  /**
   * Every device the active session's configuration records, with names.
   */
  planRecording(): PlannedDevice[] {
    const session = this.requireActive("plan a recording");
    return planDevices(session.config, session.mode).map((descriptor) =>
      this.describe(descriptor)
    );
  }

  /**
   * Append a produced file to the session. Order is kept and duplicates
   * are allowed (a device may be recorded again after a retry).
   *
   * @throws SessionError INVALID_STATE without an active session
   */
  registerFile(filename: string): void {
    const session = this.requireActive("register a file");
    if (typeof filename !== "string" || !isSafePathSegment(filename)) {
      throw new SessionError(
        "INVALID_ARGUMENT",
        `Registered files must be plain filenames inside the session directory, got "${String(filename)}"`
      );
    }
    session.filesCreated.push(filename);
    this.logger.debug(`Registered ${filename} (${session.filesCreated.length} files)`);
  }

  /**
   * Merge entries into the session metadata; later writes win.
   *
   * @throws SessionError INVALID_STATE without an active session
   */
  updateMetadata(entries: SessionMetadata): SessionInfo {
    const session = this.requireActive("update metadata");
    Object.assign(session.metadata, structuredClone(entries));
    return toInfo(session);
  }

  /**
   * Merge `metadata`, write the manifest and end the session.
   *
   * If the manifest cannot be written the session stays active and
   * unchanged, so finalize can be retried.
   *
   * @throws SessionError INVALID_STATE without an active session
   * @throws SessionError MANIFEST_WRITE_FAILED
   */
  finalize(metadata: SessionMetadata = {}): SessionManifest {
    const session = this.requireActive("finalize");
    const finalizedAt = this.now().toISOString();

    const info: SessionInfo = {
      ...toInfo(session),
      metadata: { ...structuredClone(session.metadata), ...structuredClone(metadata) },
    };
    const manifest = buildManifest(info, session.config, finalizedAt);

    try {
      writeManifest(manifest, session.sessionDirectory);
    } catch (error) {
      this.logger.error(
        `Finalize failed, session left active: ${errorMessage(error)}`
      );
      throw error;
    }

    this.active = null;
    this.endInHistory({ ...info, state: "finalized" }, "finalized", finalizedAt);
    this.logger.info(
      `Session finalized: ${session.sessionDirectory} (${manifest.total_files} files)`
    );
    return manifest;
  }

  /**
   * Best-effort cleanup of a failed session. Never throws.
   *
   * Removes registered files only (capture processes may still be writing
   * others), removes the directory if that empties it, and otherwise
   * leaves an aborted marker. Each step is attempted independently.
   * Without an active session this is a no-op.
   */
  cleanupFailedSession(): CleanupReport {
    const report: CleanupReport = {
      cleaned: false,
      removedFiles: [],
      removedDirectory: false,
      markerWritten: false,
      failures: [],
    };

    const session = this.active;
    if (!session) {
      return report;
    }

    const attempt = (step: string, fn: () => void): void => {
      try {
        fn();
      } catch (error) {
        report.failures.push(`${step}: ${errorMessage(error)}`);
        this.logger.warn(`Cleanup step "${step}" failed: ${errorMessage(error)}`);
      }
    };

    const abortedAt = this.now().toISOString();
    const directory = session.sessionDirectory;

    try {
      for (const filename of new Set(session.filesCreated)) {
        attempt(`remove ${filename}`, () => {
          const filePath = path.join(directory, filename);
          if (fs.existsSync(filePath)) {
            fs.unlinkSync(filePath);
            report.removedFiles.push(filename);
          }
        });
      }

      attempt("remove directory", () => {
        if (fs.existsSync(directory) && fs.readdirSync(directory).length === 0) {
          fs.rmdirSync(directory);
        }
        report.removedDirectory = !fs.existsSync(directory);
      });

      if (!report.removedDirectory) {
        attempt("write aborted marker", () => {
          const marker: AbortedSessionMarker = {
            session_id: session.id,
            timestamp: session.timestamp,
            mode: session.mode,
            session_dir: directory,
            files_created: [...session.filesCreated],
            aborted_at: abortedAt,
          };
          fs.writeFileSync(
            getAbortedMarkerPath(directory),
            JSON.stringify(marker, null, 2) + "\n",
            "utf-8"
          );
          report.markerWritten = true;
        });
      }

      this.endInHistory({ ...toInfo(session), state: "aborted" }, "aborted", abortedAt);
    } finally {
      this.active = null;
      report.cleaned = true;
    }

    this.logger.warn(
      `Cleaned up failed session ${directory}: removed ${report.removedFiles.length} files` +
        (report.failures.length > 0 ? `, ${report.failures.length} steps failed` : "")
    );
    return report;
  }

  private requireActive(operation: string): ActiveSession {
    if (!this.active) {
      throw new SessionError(
        "INVALID_STATE",
        `No active recording session: create a session before trying to ${operation}`
      );
    }
    return this.active;
  }

  /**
   * Create the session directory (and parents), or reuse an existing one.
   * A restart within the same timestamp lands in the directory of the
   * previous take; its files stay where they are.
   */
  private prepareDirectory(sessionDirectory: string): void {
    let existing: string[];
    try {
      fs.mkdirSync(sessionDirectory, { recursive: true });
      existing = fs.readdirSync(sessionDirectory);
    } catch (error) {
      throw new SessionError(
        "DIRECTORY_CREATION_FAILED",
        `Cannot create session directory ${sessionDirectory}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    if (existing.length > 0) {
      this.logger.warn(
        `Reusing session directory ${sessionDirectory} (${existing.length} existing entries)`
      );
    }
  }

  private describe(descriptor: DeviceDescriptor): PlannedDevice {
    if (descriptor.deviceClass === "audio") {
      return {
        descriptor,
        friendlyName: this.resolveName(descriptor),
        filename: this.generateAudioFilename(descriptor.deviceIndex),
      };
    }
    return {
      descriptor,
      friendlyName: this.resolveName(descriptor),
      filename: this.generateCameraFilename(
        descriptor.role,
        descriptor.hostIdentifier,
        descriptor.deviceIndex
      ),
    };
  }

  private resolveName(descriptor: DeviceDescriptor): string {
    const session = this.requireActive("resolve a device name");
    const host =
      descriptor.deviceClass === "camera" ? descriptor.hostIdentifier : "";
    return resolveDeviceName(
      descriptor.deviceClass,
      host,
      descriptor.deviceIndex,
      session.config
    );
  }

  private endInHistory(
    info: SessionInfo,
    status: SessionEndStatus,
    endedAt: string
  ): void {
    this.notifyHistory("recordEnded", () =>
      this.history?.recordEnded(info, status, endedAt)
    );
  }

  /** History is bookkeeping only; its failures never change the lifecycle outcome */
  private notifyHistory(step: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.warn(`Session history ${step} failed: ${errorMessage(error)}`);
    }
  }
}
