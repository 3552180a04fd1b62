import { describe, it, expect } from "vitest";
import { formatTimestamp, isSafePathSegment } from "./timestamp.js";

describe("formatTimestamp", () => {
  // Local-time constructor, so the expectation does not depend on TZ
  const date = new Date(2025, 7, 14, 15, 30, 45);

  it("renders the default session format", () => {
    expect(formatTimestamp("%Y-%m-%d_%H-%M-%S", date)).toBe(
      "2025-08-14_15-30-45"
    );
  });

  it("zero-pads single-digit fields", () => {
    expect(formatTimestamp("%m/%d %H:%M:%S", new Date(2024, 0, 2, 3, 4, 5))).toBe(
      "01/02 03:04:05"
    );
  });

  it("copies literals, %% and unknown directives", () => {
    expect(formatTimestamp("run_%Y%%_%q", date)).toBe("run_2025%_%q");
  });
});

describe("isSafePathSegment", () => {
  it("accepts timestamps and filenames", () => {
    expect(isSafePathSegment("2025-08-14_15-30-45")).toBe(true);
    expect(isSafePathSegment("2025-08-14_15-30-45-master-master_cam.mkv")).toBe(true);
  });

  it("rejects traversal and separators", () => {
    expect(isSafePathSegment("")).toBe(false);
    expect(isSafePathSegment(".")).toBe(false);
    expect(isSafePathSegment("..")).toBe(false);
    expect(isSafePathSegment("a/b")).toBe(false);
    expect(isSafePathSegment("a\\b")).toBe(false);
  });
});
