/**
 * Database module exports.
 */

export { openDatabase, openMemoryDatabase } from "./connection.js";
export { runMigrations, getDefaultMigrationsDir } from "./migrations.js";
export {
  insertSession,
  endSession,
  getSessionById,
  listSessions,
  abortStaleSessions,
  createSqliteHistory,
} from "./sessions.js";
