/**
 * Runtime settings.
 * Reads from environment variables with sensible defaults.
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";

/** Get the default session history database path in user's home directory */
export function getDefaultDbPath(): string {
  return join(homedir(), ".capture-session", "capture-session.sqlite");
}

/** Get the default recording configuration file path (working directory) */
export function getDefaultRecordingConfigPath(): string {
  return resolve("capture-session.json");
}

export const DEFAULT_LISTEN_PORT = 8790;

export interface Config {
  /** Port for the daemon REST API (default: 8790) */
  listenPort: number;

  /** Path to SQLite session history (default: ~/.capture-session/capture-session.sqlite) */
  dbPath: string;

  /** Path to the recording configuration file (default: ./capture-session.json) */
  recordingConfigPath: string;

  /** Emit debug log lines */
  debug: boolean;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_LISTEN_PORT;
  }
  const port = parseInt(raw, 10);
  if (isNaN(port) || port <= 0 || port > 65535) {
    console.warn(
      `[Config] Ignoring invalid CS_LISTEN_PORT "${raw}", using ${DEFAULT_LISTEN_PORT}`
    );
    return DEFAULT_LISTEN_PORT;
  }
  return port;
}

/**
 * Load runtime settings from environment variables.
 */
export function loadConfig(): Config {
  return {
    listenPort: parsePort(process.env["CS_LISTEN_PORT"]),
    dbPath: process.env["CS_DB_PATH"] ?? getDefaultDbPath(),
    recordingConfigPath:
      process.env["CS_CONFIG_PATH"] ?? getDefaultRecordingConfigPath(),
    debug: process.env["CS_DEBUG"] === "1",
  };
}

/** Base URL of the local daemon */
export function getDaemonUrl(config: Config = loadConfig()): string {
  return `http://127.0.0.1:${config.listenPort}`;
}
