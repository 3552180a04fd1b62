/**
 * Session history CRUD operations.
 * Uses better-sqlite3 sync API.
 */

import type Database from "better-sqlite3";
import type {
  RecordingMode,
  SessionHistoryStatus,
  SessionInfo,
  SessionRecord,
} from "../types/index.js";
import type { SessionHistory } from "../session/index.js";

/** Row shape from SQLite */
interface SessionRow {
  id: string;
  timestamp: string;
  mode: RecordingMode;
  session_dir: string;
  status: SessionHistoryStatus;
  file_count: number;
  started_at: string;
  ended_at: string | null;
  created_at: string;
}

/** Convert DB row to SessionRecord type */
function rowToRecord(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    mode: row.mode,
    sessionDirectory: row.session_dir,
    status: row.status,
    fileCount: row.file_count,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    createdAt: row.created_at,
  };
}

/** Insert a newly created (active) session */
export function insertSession(
  db: Database.Database,
  session: SessionInfo
): SessionRecord {
  db.prepare(
    `INSERT INTO sessions (id, timestamp, mode, session_dir, status, file_count, started_at)
     VALUES (?, ?, ?, ?, 'active', ?, ?)`
  ).run(
    session.id,
    session.timestamp,
    session.mode,
    session.sessionDirectory,
    session.filesCreated.length,
    session.createdAt
  );

  const record = getSessionById(db, session.id);
  if (!record) {
    throw new Error(`Session ${session.id} was not stored`);
  }
  return record;
}

/** End a session by setting status, file count and ended_at */
export function endSession(
  db: Database.Database,
  id: string,
  status: Exclude<SessionHistoryStatus, "active">,
  fileCount: number,
  endedAt: string
): SessionRecord | null {
  const result = db
    .prepare(
      `UPDATE sessions SET status = ?, file_count = ?, ended_at = ?
       WHERE id = ?`
    )
    .run(status, fileCount, endedAt, id);

  if (result.changes === 0) {
    return null;
  }
  return getSessionById(db, id);
}

/** Get session by ID */
export function getSessionById(
  db: Database.Database,
  id: string
): SessionRecord | null {
  const row = db.prepare("SELECT * FROM sessions WHERE id = ?").get(id) as
    | SessionRow
    | undefined;
  return row ? rowToRecord(row) : null;
}

/** List sessions, newest first, with optional status filter */
export function listSessions(
  db: Database.Database,
  status?: SessionHistoryStatus
): SessionRecord[] {
  if (status) {
    const rows = db
      .prepare(
        "SELECT * FROM sessions WHERE status = ? ORDER BY started_at DESC, rowid DESC"
      )
      .all(status) as SessionRow[];
    return rows.map(rowToRecord);
  }
  const rows = db
    .prepare("SELECT * FROM sessions ORDER BY started_at DESC, rowid DESC")
    .all() as SessionRow[];
  return rows.map(rowToRecord);
}

/**
 * Mark sessions left active by a previous daemon process as aborted.
 * Returns the number of sessions updated.
 */
export function abortStaleSessions(
  db: Database.Database,
  endedAt: string
): number {
  const result = db
    .prepare(
      "UPDATE sessions SET status = 'aborted', ended_at = ? WHERE status = 'active'"
    )
    .run(endedAt);
  return result.changes;
}

/**
 * Session history backed by the sessions table.
 */
export function createSqliteHistory(db: Database.Database): SessionHistory {
  return {
    recordStarted(session) {
      insertSession(db, session);
    },
    recordEnded(session, status, endedAt) {
      endSession(db, session.id, status, session.filesCreated.length, endedAt);
    },
  };
}
