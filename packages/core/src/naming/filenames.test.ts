import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { buildAudioFilename, buildCameraFilename, roleTag } from "./filenames.js";
import { buildSessionPath } from "./session-paths.js";

describe("roleTag", () => {
  it("maps camera roles to filename tags", () => {
    expect(roleTag("master")).toBe("master");
    expect(roleTag("subordinate")).toBe("sub");
    expect(roleTag("sub")).toBe("sub");
    expect(roleTag("standalone")).toBe("standalone");
  });
});

describe("filenames", () => {
  it("builds camera filenames", () => {
    expect(
      buildCameraFilename("2025-08-14_15-30-45", "subordinate", "left_cam", "mkv")
    ).toBe("2025-08-14_15-30-45-sub-left_cam.mkv");
  });

  it("builds audio filenames", () => {
    expect(buildAudioFilename("2025-08-14_15-30-45", "main_mic", "wav")).toBe(
      "2025-08-14_15-30-45-main_mic.wav"
    );
  });
});

describe("buildSessionPath", () => {
  it("lays sessions out as base/mode/timestamp", () => {
    const base = path.join(path.sep, "data", "recordings");
    expect(buildSessionPath("sync", "2025-08-14_15-30-45", base)).toBe(
      path.join(base, "sync", "2025-08-14_15-30-45")
    );
    expect(buildSessionPath("standalone", "t1", "recordings")).toBe(
      path.join("recordings", "standalone", "t1")
    );
  });

  it("is deterministic", () => {
    const first = buildSessionPath("sync", "t1", "/data");
    const second = buildSessionPath("sync", "t1", "/data");
    expect(first).toBe(second);
  });
});
