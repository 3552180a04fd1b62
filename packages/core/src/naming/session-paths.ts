/**
 * Session directory layout: {baseDirectory}/{mode}/{timestamp}
 */

import * as path from "node:path";
import type { RecordingMode } from "../types/index.js";

const MODE_DIRECTORIES: Record<RecordingMode, string> = {
  standalone: "standalone",
  sync: "sync",
};

/** Manifest written into every finalized session directory */
export const MANIFEST_FILENAME = "session_info.json";

/** Marker written into a session directory that cleanup could not remove */
export const ABORTED_MARKER_FILENAME = "session_aborted.json";

/**
 * Build the session directory path. Pure: creates nothing on disk.
 */
export function buildSessionPath(
  mode: RecordingMode,
  timestamp: string,
  baseDirectory: string
): string {
  return path.join(baseDirectory, MODE_DIRECTORIES[mode], timestamp);
}

export function getManifestPath(sessionDirectory: string): string {
  return path.join(sessionDirectory, MANIFEST_FILENAME);
}

export function getAbortedMarkerPath(sessionDirectory: string): string {
  return path.join(sessionDirectory, ABORTED_MARKER_FILENAME);
}
