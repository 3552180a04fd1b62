/**
 * Session history hook.
 * The manager reports every session start and end; the daemon backs this
 * with SQLite (see db/sessions.ts).
 */

import type { SessionInfo } from "../types/index.js";

export type SessionEndStatus = "finalized" | "aborted";

export interface SessionHistory {
  recordStarted(session: SessionInfo): void;
  recordEnded(session: SessionInfo, status: SessionEndStatus, endedAt: string): void;
}
