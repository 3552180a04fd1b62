/**
 * Tests for the recording session lifecycle.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { RecordingSessionManager } from "./manager.js";
import type { SessionHistory } from "./history.js";
import { getDefaultRecordingConfig, type RecordingConfig } from "../recording-config.js";
import { SessionError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { SessionManifest } from "../types/index.js";

const TIMESTAMP = "2025-08-14_15-30-45";

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function expectSessionError(fn: () => unknown, code: SessionError["code"]): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(SessionError);
  expect((caught as SessionError).code).toBe(code);
}

function readManifestFile(sessionDirectory: string): SessionManifest {
  return JSON.parse(
    fs.readFileSync(path.join(sessionDirectory, "session_info.json"), "utf-8")
  ) as SessionManifest;
}

describe("RecordingSessionManager", () => {
  let tempDir: string;
  let config: RecordingConfig;
  let manager: RecordingSessionManager;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cs-session-test-"));
    config = getDefaultRecordingConfig();
    config.recording.base_output_dir = tempDir;
    manager = new RecordingSessionManager({
      config,
      logger: silentLogger,
      now: () => new Date(2025, 7, 14, 15, 30, 45),
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("createSession", () => {
    it("creates base/mode/timestamp and returns the session", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });

      expect(session.timestamp).toBe(TIMESTAMP);
      expect(session.mode).toBe("sync");
      expect(session.state).toBe("active");
      expect(session.baseDirectory).toBe(tempDir);
      expect(session.sessionDirectory).toBe(path.join(tempDir, "sync", TIMESTAMP));
      expect(session.filesCreated).toEqual([]);
      expect(fs.statSync(session.sessionDirectory).isDirectory()).toBe(true);
    });

    it("formats the current time and uses the configured mode by default", () => {
      config.recording.mode = "standalone";
      const session = manager.createSession();

      expect(session.timestamp).toBe(TIMESTAMP);
      expect(session.mode).toBe("standalone");
      expect(session.metadata).toEqual({
        created_at: new Date(2025, 7, 14, 15, 30, 45).toISOString(),
        duration: 10,
        device_count: 2,
      });
    });

    it("seeds the planned device count for the session's mode", () => {
      config.camera.ip_devices = { "127.0.0.1": [0, 2], "192.168.1.50": [1] };
      config.audio.input_device_index = [1, 5];

      const session = manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });

      expect(session.metadata["device_count"]).toBe(5);
    });

    it("refuses a second session while one is active", () => {
      manager.createSession({ timestamp: TIMESTAMP });

      expectSessionError(
        () => manager.createSession({ timestamp: "2025-08-14_15-31-00" }),
        "ALREADY_ACTIVE"
      );
      expect(manager.getCurrentSessionInfo()?.timestamp).toBe(TIMESTAMP);
    });

    it("rejects timestamps that are not a single directory name", () => {
      expectSessionError(
        () => manager.createSession({ timestamp: "../escape" }),
        "INVALID_ARGUMENT"
      );
      expect(manager.hasActiveSession()).toBe(false);
    });

    it("fails without an active session when the directory cannot be created", () => {
      fs.writeFileSync(path.join(tempDir, "sync"), "not a directory");

      expectSessionError(
        () => manager.createSession({ timestamp: TIMESTAMP, mode: "sync" }),
        "DIRECTORY_CREATION_FAILED"
      );
      expect(manager.getCurrentSessionInfo()).toBeNull();
    });

    it("reuses a session directory that already holds files", () => {
      const existing = path.join(tempDir, "sync", TIMESTAMP);
      fs.mkdirSync(existing, { recursive: true });
      fs.writeFileSync(path.join(existing, "old.mkv"), "");

      const session = manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });

      expect(session.sessionDirectory).toBe(existing);
      expect(session.filesCreated).toEqual([]);
      expect(fs.readdirSync(existing)).toEqual(["old.mkv"]);
    });

    it("reuses an existing empty session directory", () => {
      fs.mkdirSync(path.join(tempDir, "sync", TIMESTAMP), { recursive: true });
      expect(manager.createSession({ timestamp: TIMESTAMP, mode: "sync" }).state).toBe(
        "active"
      );
    });
  });

  describe("filename generation", () => {
    it("requires an active session", () => {
      expectSessionError(() => manager.generateCameraFilename("master", "127.0.0.1", 0), "INVALID_STATE");
      expectSessionError(() => manager.generateAudioFilename(1), "INVALID_STATE");
    });

    it("names the master camera", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      expect(manager.generateCameraFilename("master", "127.0.0.1", 0)).toBe(
        "2025-08-14_15-30-45-master-master_cam.mkv"
      );
    });

    it("names a subordinate camera", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      expect(manager.generateCameraFilename("subordinate", "127.0.0.1", 2)).toBe(
        "2025-08-14_15-30-45-sub-left_cam.mkv"
      );
    });

    it("names an audio device", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      expect(manager.generateAudioFilename(1)).toBe("2025-08-14_15-30-45-main_mic.wav");
    });

    it("gives unmapped remote cameras distinct fallback names", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      const nine = manager.generateCameraFilename("subordinate", "192.168.1.50", 9);
      const ten = manager.generateCameraFilename("subordinate", "192.168.1.50", 10);

      expect(nine).toBe("2025-08-14_15-30-45-sub-camera_192.168.1.50_cam9.mkv");
      expect(ten).toBe("2025-08-14_15-30-45-sub-camera_192.168.1.50_cam10.mkv");
    });

    it("does not register anything and is repeatable", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      const first = manager.generateAudioFilename(5);
      const second = manager.generateAudioFilename(5);

      expect(first).toBe(second);
      expect(manager.getCurrentSessionInfo()?.filesCreated).toEqual([]);
    });

    it("rejects negative device indices", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      expectSessionError(() => manager.generateAudioFilename(-1), "INVALID_ARGUMENT");
    });

    it("keeps the names resolved at creation after a configuration change", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });

      const renamed = getDefaultRecordingConfig();
      renamed.audio.device_names["1"] = "podium_mic";
      manager.setConfiguration(renamed);
      config.audio.device_names["1"] = "edited_in_place";

      expect(manager.generateAudioFilename(1)).toBe("2025-08-14_15-30-45-main_mic.wav");
      expect(manager.getConfiguration()).toBe(renamed);
    });
  });

  describe("planRecording", () => {
    it("lists the configured sync devices with their filenames", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });

      expect(manager.planRecording().map((device) => device.filename)).toEqual([
        "2025-08-14_15-30-45-master-master_cam.mkv",
        "2025-08-14_15-30-45-sub-left_cam.mkv",
        "2025-08-14_15-30-45-sub-right_cam.mkv",
        "2025-08-14_15-30-45-main_mic.wav",
      ]);
    });

    it("lists the standalone camera", () => {
      manager.createSession({ timestamp: TIMESTAMP, mode: "standalone" });

      const plan = manager.planRecording();
      expect(plan[0]).toEqual({
        descriptor: {
          deviceClass: "camera",
          role: "standalone",
          hostIdentifier: "local",
          deviceIndex: 1,
        },
        friendlyName: "standalone_cam",
        filename: "2025-08-14_15-30-45-standalone-standalone_cam.mkv",
      });
      expect(plan).toHaveLength(2);
    });
  });

  describe("registerFile", () => {
    it("requires an active session", () => {
      expectSessionError(() => manager.registerFile("a.mkv"), "INVALID_STATE");
    });

    it("keeps order and duplicates", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      manager.registerFile("a.mkv");
      manager.registerFile("b.wav");
      manager.registerFile("a.mkv");

      expect(manager.getCurrentSessionInfo()?.filesCreated).toEqual([
        "a.mkv",
        "b.wav",
        "a.mkv",
      ]);
    });

    it("rejects paths outside the session directory", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      expectSessionError(() => manager.registerFile("../other.mkv"), "INVALID_ARGUMENT");
      expectSessionError(() => manager.registerFile(""), "INVALID_ARGUMENT");
    });

    it("returns snapshots that do not alias session state", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      const snapshot = manager.getCurrentSessionInfo();
      snapshot?.filesCreated.push("injected.mkv");

      expect(manager.getCurrentSessionInfo()?.filesCreated).toEqual([]);
    });
  });

  describe("finalize", () => {
    it("writes the manifest in registration order and ends the session", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      manager.registerFile("a.mkv");
      manager.registerFile("b.wav");
      manager.registerFile("a.mkv");

      const manifest = manager.finalize({ device_count: 2 });

      const written = readManifestFile(session.sessionDirectory);
      expect(written).toEqual(manifest);
      expect(written.files_created).toEqual(["a.mkv", "b.wav", "a.mkv"]);
      expect(written.total_files).toBe(3);
      expect(written.timestamp).toBe(TIMESTAMP);
      expect(written.mode).toBe("sync");
      expect(written.session_dir).toBe(session.sessionDirectory);
      expect(written.metadata["device_count"]).toBe(2);
      expect(manager.getCurrentSessionInfo()).toBeNull();
    });

    it("rejects further registrations after finalize", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      manager.registerFile("a.mkv");
      manager.registerFile("b.wav");
      manager.finalize({ device_count: 2 });

      expectSessionError(() => manager.registerFile("c.mkv"), "INVALID_STATE");
      expectSessionError(() => manager.generateAudioFilename(1), "INVALID_STATE");
      expectSessionError(() => manager.finalize(), "INVALID_STATE");
    });

    it("lets caller metadata overwrite session metadata", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP });
      manager.updateMetadata({ operator: "alice", duration: 12 });

      manager.finalize({ duration: 30 });

      const written = readManifestFile(session.sessionDirectory);
      expect(written.metadata["operator"]).toBe("alice");
      expect(written.metadata["duration"]).toBe(30);
    });

    it("leaves no temporary file behind", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP });
      manager.finalize();

      expect(fs.readdirSync(session.sessionDirectory)).toEqual(["session_info.json"]);
    });

    it("keeps the session active when the manifest cannot be written", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP });
      manager.registerFile("a.mkv");
      // A directory in place of the manifest makes the rename fail
      fs.mkdirSync(path.join(session.sessionDirectory, "session_info.json"));

      expectSessionError(() => manager.finalize({ operator: "bob" }), "MANIFEST_WRITE_FAILED");

      const current = manager.getCurrentSessionInfo();
      expect(current?.id).toBe(session.id);
      expect(current?.metadata["operator"]).toBeUndefined();
      expect(fs.existsSync(path.join(session.sessionDirectory, "session_info.json.tmp"))).toBe(
        false
      );

      fs.rmdirSync(path.join(session.sessionDirectory, "session_info.json"));
      expect(manager.finalize({ operator: "bob" }).files_created).toEqual(["a.mkv"]);
    });

    it("lets caller metadata override the seeded device count", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP, mode: "sync" });
      expect(session.metadata["device_count"]).toBe(4);

      const manifest = manager.finalize({ device_count: 3 });

      expect(manifest.metadata["device_count"]).toBe(3);
      expect(manifest.metadata["duration"]).toBe(10);
    });

    it("allows a new session within the same second", () => {
      const first = manager.createSession();
      manager.registerFile("a.mkv");
      manager.finalize();

      const second = manager.createSession();

      expect(second.sessionDirectory).toBe(first.sessionDirectory);
      expect(second.id).not.toBe(first.id);
      expect(second.filesCreated).toEqual([]);
      expect(fs.existsSync(path.join(second.sessionDirectory, "session_info.json"))).toBe(true);
    });

    it("allows a fresh session afterwards", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      manager.registerFile("a.mkv");
      manager.finalize();

      const next = manager.createSession({ timestamp: "2025-08-14_15-40-00" });
      expect(next.filesCreated).toEqual([]);
      expect(next.timestamp).toBe("2025-08-14_15-40-00");
    });
  });

  describe("cleanupFailedSession", () => {
    it("is a no-op without an active session", () => {
      expect(manager.cleanupFailedSession()).toEqual({
        cleaned: false,
        removedFiles: [],
        removedDirectory: false,
        markerWritten: false,
        failures: [],
      });
      expect(() => manager.cleanupFailedSession()).not.toThrow();
    });

    it("removes registered files and the emptied directory", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP });
      fs.writeFileSync(path.join(session.sessionDirectory, "a.mkv"), "frames");
      manager.registerFile("a.mkv");
      manager.registerFile("a.mkv");

      const report = manager.cleanupFailedSession();

      expect(report).toEqual({
        cleaned: true,
        removedFiles: ["a.mkv"],
        removedDirectory: true,
        markerWritten: false,
        failures: [],
      });
      expect(fs.existsSync(session.sessionDirectory)).toBe(false);
      expect(manager.getCurrentSessionInfo()).toBeNull();
    });

    it("leaves unregistered files and marks the session aborted", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP });
      fs.writeFileSync(path.join(session.sessionDirectory, "a.mkv"), "frames");
      fs.writeFileSync(path.join(session.sessionDirectory, "still-writing.wav"), "pcm");
      manager.registerFile("a.mkv");

      const report = manager.cleanupFailedSession();

      expect(report.removedFiles).toEqual(["a.mkv"]);
      expect(report.removedDirectory).toBe(false);
      expect(report.markerWritten).toBe(true);
      expect(fs.readdirSync(session.sessionDirectory).sort()).toEqual([
        "session_aborted.json",
        "still-writing.wav",
      ]);
      const marker = JSON.parse(
        fs.readFileSync(path.join(session.sessionDirectory, "session_aborted.json"), "utf-8")
      ) as { files_created: string[]; timestamp: string };
      expect(marker.timestamp).toBe(TIMESTAMP);
      expect(marker.files_created).toEqual(["a.mkv"]);
    });

    it("is idempotent and allows a new session", () => {
      manager.createSession({ timestamp: TIMESTAMP });
      manager.cleanupFailedSession();

      expect(manager.cleanupFailedSession().cleaned).toBe(false);
      expect(() => manager.registerFile("a.mkv")).toThrow(SessionError);
      expect(manager.createSession({ timestamp: TIMESTAMP }).timestamp).toBe(TIMESTAMP);
    });

    it("allows the same timestamp again when files were left behind", () => {
      const session = manager.createSession({ timestamp: "T" });
      fs.writeFileSync(path.join(session.sessionDirectory, "partial.mkv"), "frames");
      manager.cleanupFailedSession();

      const retry = manager.createSession({ timestamp: "T" });

      expect(retry.sessionDirectory).toBe(session.sessionDirectory);
      expect(retry.state).toBe("active");
      expect(fs.readdirSync(retry.sessionDirectory).sort()).toEqual([
        "partial.mkv",
        "session_aborted.json",
      ]);
    });

    it("never throws when the directory vanished", () => {
      const session = manager.createSession({ timestamp: TIMESTAMP });
      manager.registerFile("a.mkv");
      fs.rmSync(session.sessionDirectory, { recursive: true });

      const report = manager.cleanupFailedSession();
      expect(report.cleaned).toBe(true);
      expect(report.removedDirectory).toBe(true);
      expect(report.removedFiles).toEqual([]);
    });
  });

  describe("history", () => {
    it("records starts and ends", () => {
      const history: SessionHistory = {
        recordStarted: vi.fn(),
        recordEnded: vi.fn(),
      };
      const tracked = new RecordingSessionManager({
        config,
        history,
        logger: silentLogger,
        now: () => new Date("2025-08-14T13:30:45.000Z"),
      });

      const first = tracked.createSession({ timestamp: "t1" });
      tracked.registerFile("a.mkv");
      tracked.finalize();
      const second = tracked.createSession({ timestamp: "t2" });
      tracked.cleanupFailedSession();

      expect(history.recordStarted).toHaveBeenCalledTimes(2);
      expect(history.recordEnded).toHaveBeenNthCalledWith(
        1,
        expect.objectContaining({ id: first.id, filesCreated: ["a.mkv"], state: "finalized" }),
        "finalized",
        "2025-08-14T13:30:45.000Z"
      );
      expect(history.recordEnded).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({ id: second.id, state: "aborted" }),
        "aborted",
        "2025-08-14T13:30:45.000Z"
      );
    });

    it("does not let history failures change the outcome", () => {
      const history: SessionHistory = {
        recordStarted: () => {
          throw new Error("disk full");
        },
        recordEnded: () => {
          throw new Error("disk full");
        },
      };
      const tracked = new RecordingSessionManager({ config, history, logger: silentLogger });

      const session = tracked.createSession({ timestamp: TIMESTAMP });
      expect(tracked.finalize().session_id).toBe(session.id);
      expect(tracked.hasActiveSession()).toBe(false);
    });
  });
});
