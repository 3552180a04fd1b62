/**
 * Status command - daemon process, REST API and active session.
 */

import {
  loadConfig,
  getDaemonPaths,
  getDaemonUrl,
  readPidFile,
  isProcessRunning,
} from "@capture-session/core";
import type { HealthResponse } from "@capture-session/service";
import { daemonRequest } from "../api.js";
import { formatUptime } from "../format.js";

export async function statusCommand(): Promise<void> {
  const config = loadConfig();
  const paths = getDaemonPaths();

  console.log("Capture Session Status");
  console.log("======================");

  const pid = readPidFile(paths.pidFile);
  if (pid === null || !isProcessRunning(pid)) {
    console.log("State:        stopped");
    console.log(
      pid === null
        ? "Reason:       No PID file found"
        : `Reason:       Stale PID file (${pid} not running)`
    );
    console.log("");
    console.log("Run 'capture-session start --daemon' to start.");
    process.exit(1);
  }

  let health: HealthResponse | null = null;
  try {
    health = await daemonRequest<HealthResponse>("GET", "/api/health");
  } catch (error) {
    console.log(`Health check failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  console.log("State:        running");
  console.log(`PID:          ${pid}`);
  if (health) {
    console.log(`Uptime:       ${formatUptime(health.uptime)}`);
  }
  console.log(`REST API:     ${getDaemonUrl(config)} ${health ? "(✓)" : "(✗)"}`);
  if (health?.sessionActive) {
    console.log(`Session:      active (${health.sessionTimestamp ?? "unknown"})`);
  } else if (health) {
    console.log("Session:      none");
  } else {
    console.log("Session:      unknown");
  }
  console.log(`Config:       ${config.recordingConfigPath}`);
  console.log(`DB Path:      ${config.dbPath}`);

  if (!health) {
    console.log("");
    console.log("⚠ REST API is not reachable. Check the log file:");
    console.log(`  ${paths.logFile}`);
  }
}
