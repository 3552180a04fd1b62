/**
 * Terminal output formatting.
 */

import type { PlannedDevice, SessionRecord } from "@capture-session/core";

/**
 * Format uptime in human-readable form.
 */
export function formatUptime(seconds: number): string {
  if (seconds < 60) {
    return `${Math.floor(seconds)}s`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${minutes}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

export function formatSessionTable(sessions: SessionRecord[]): string[] {
  if (sessions.length === 0) {
    return ["No sessions found."];
  }

  const lines = [
    "ID".padEnd(38) +
      "STATUS".padEnd(11) +
      "MODE".padEnd(12) +
      "TIMESTAMP".padEnd(22) +
      "FILES",
    "-".repeat(88),
  ];
  for (const session of sessions) {
    lines.push(
      session.id.padEnd(38) +
        session.status.padEnd(11) +
        session.mode.padEnd(12) +
        session.timestamp.padEnd(22) +
        String(session.fileCount)
    );
  }
  return lines;
}

/** One line per planned device; audio lines carry their start delay */
export function formatPlan(devices: PlannedDevice[]): string[] {
  if (devices.length === 0) {
    return ["No devices configured for this mode."];
  }

  return devices.map(({ descriptor, filename }) => {
    const source =
      descriptor.deviceClass === "camera"
        ? `camera ${descriptor.role.padEnd(11)} ${descriptor.hostIdentifier}#${descriptor.deviceIndex}`
        : `audio  ${"".padEnd(11)} #${descriptor.deviceIndex} +${descriptor.startDelay}s`;
    return `${source.padEnd(42)} ${filename}`;
  });
}
