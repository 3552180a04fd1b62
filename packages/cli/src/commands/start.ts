/**
 * Start command - runs the daemon in foreground or background.
 */

import { mkdirSync, openSync, constants } from "node:fs";
import { spawn } from "node:child_process";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import {
  getDaemonPaths,
  isProcessRunning,
  readPidFile,
} from "@capture-session/core";
import { startDaemon } from "@capture-session/service";

export interface StartCommandOptions {
  daemon?: boolean;
}

async function waitForPid(attempts: number): Promise<number | null> {
  for (let i = 0; i < attempts; i++) {
    await new Promise((resolve) => setTimeout(resolve, 500));
    const pid = readPidFile();
    if (pid && isProcessRunning(pid)) {
      return pid;
    }
  }
  return null;
}

export async function startCommand(
  options: StartCommandOptions = {}
): Promise<void> {
  const paths = getDaemonPaths();

  const existingPid = readPidFile();
  if (existingPid && isProcessRunning(existingPid)) {
    console.error(
      `Daemon is already running (PID ${existingPid}).\n` +
        "Run: capture-session stop"
    );
    process.exit(1);
  }

  if (!options.daemon) {
    try {
      await startDaemon();
    } catch (error) {
      console.error(
        `Failed to start daemon: ${error instanceof Error ? error.message : String(error)}`
      );
      process.exit(1);
    }
    return;
  }

  console.log("Starting daemon in background...");

  const here = dirname(fileURLToPath(import.meta.url));
  const serviceEntry = join(here, "..", "..", "..", "service", "src", "index.ts");

  mkdirSync(paths.baseDir, { recursive: true });
  const logFd = openSync(
    paths.logFile,
    constants.O_WRONLY | constants.O_CREAT | constants.O_APPEND
  );

  const child = spawn(process.execPath, ["--import", "tsx", serviceEntry], {
    detached: true,
    stdio: ["ignore", logFd, logFd],
    env: process.env,
  });
  child.unref();

  const pid = await waitForPid(10);
  if (pid) {
    console.log(`Daemon started (PID ${pid})`);
    console.log(`Log file: ${paths.logFile}`);
    console.log(`\nRun 'capture-session status' to check status.`);
  } else {
    console.error("Failed to start daemon. Check log file for details:");
    console.error(`  ${paths.logFile}`);
    process.exit(1);
  }
}
