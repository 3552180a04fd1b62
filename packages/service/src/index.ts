/**
 * @capture-session/service
 *
 * Local daemon owning the recording session manager.
 * SQLite session history + REST API on localhost.
 */

import {
  abortStaleSessions,
  acquireLockWithCleanup,
  createLogger,
  type DaemonPaths,
  createSqliteHistory,
  getDaemonPaths,
  getDefaultMigrationsDir,
  installTimestampLogging,
  loadConfig,
  loadRecordingConfig,
  openDatabase,
  RecordingSessionManager,
  releaseLock,
  removePidFile,
  runMigrations,
  writePidFile,
} from "@capture-session/core";
import type { FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import { createServer, startServer } from "./server.js";

export { createServer, startServer, type CreateServerOptions } from "./server.js";
export { statusForSessionError } from "./error-handler.js";
export type { HealthResponse } from "./routes/health.js";

const logger = createLogger("Daemon");

export interface DaemonHandle {
  shutdown: () => Promise<void>;
}

export interface StartDaemonOptions {
  /** PID, lock and log locations (default: ~/.capture-session) */
  paths?: DaemonPaths;
}

/**
 * Start the daemon with configuration from the environment.
 * Used by the CLI and for direct execution.
 *
 * @throws if another daemon holds the lock or the configuration is invalid
 */
export async function startDaemon(
  options: StartDaemonOptions = {}
): Promise<DaemonHandle> {
  installTimestampLogging();
  const config = loadConfig();
  const paths = options.paths ?? getDaemonPaths();

  const lock = acquireLockWithCleanup(paths.lockFile);
  if (!lock.acquired) {
    throw new Error(
      "existingPid" in lock
        ? `Daemon already running (PID ${lock.existingPid})`
        : `Could not acquire lock ${paths.lockFile}: ${lock.error}`
    );
  }

  let db: Database.Database | undefined;
  let app: FastifyInstance | undefined;
  try {
    logger.info(`Recording config: ${config.recordingConfigPath}`);
    logger.info(`Database: ${config.dbPath}`);

    const recordingConfig = loadRecordingConfig(config.recordingConfigPath);
    const database = openDatabase(config.dbPath);
    db = database;
    runMigrations(database, getDefaultMigrationsDir());

    const stale = abortStaleSessions(database, new Date().toISOString());
    if (stale > 0) {
      logger.warn(`Marked ${stale} session(s) from a previous run as aborted`);
    }

    const manager = new RecordingSessionManager({
      config: recordingConfig,
      history: createSqliteHistory(database),
    });

    const server = await createServer({
      manager,
      db: database,
      recordingConfigPath: config.recordingConfigPath,
    });
    app = server;
    await startServer(server, config.listenPort);
    writePidFile(process.pid, paths.pidFile);

    let closing: Promise<void> | null = null;
    const shutdown = (): Promise<void> => {
      closing ??= (async () => {
        logger.info("Shutting down...");
        // Nobody can finalize a session once the daemon is gone
        manager.cleanupFailedSession();
        await server.close();
        database.close();
        removePidFile(paths.pidFile);
        releaseLock(paths.lockFile);
      })();
      return closing;
    };

    const onSignal = (): void => {
      shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Shutdown failed:", error);
          process.exit(1);
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    return { shutdown };
  } catch (error) {
    await app?.close().catch((closeError: unknown) => {
      logger.warn("Could not close the server after a failed start:", closeError);
    });
    db?.close();
    releaseLock(paths.lockFile);
    throw error;
  }
}

// Run if executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  startDaemon().catch((error: unknown) => {
    logger.error("Failed to start daemon:", error);
    process.exit(1);
  });
}
