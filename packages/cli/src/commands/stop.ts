/**
 * Stop command - stops a running daemon.
 * The daemon cleans up an unfinished session on SIGTERM.
 */

import {
  getDaemonPaths,
  readPidFile,
  removePidFile,
  isProcessRunning,
  releaseLock,
} from "@capture-session/core";

export interface StopCommandOptions {
  force?: boolean;
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const startTime = Date.now();
  while (Date.now() - startTime < timeoutMs) {
    await new Promise((resolve) => setTimeout(resolve, 100));
    if (!isProcessRunning(pid)) {
      return true;
    }
  }
  return false;
}

export async function stopCommand(
  options: StopCommandOptions = {}
): Promise<void> {
  const paths = getDaemonPaths();
  const clearStateFiles = (): void => {
    removePidFile(paths.pidFile);
    releaseLock(paths.lockFile);
  };

  const pid = readPidFile(paths.pidFile);
  if (pid === null) {
    console.log("Daemon is not running (no PID file).");
    return;
  }

  if (!isProcessRunning(pid)) {
    console.log(`Daemon is not running (stale PID ${pid}).`);
    clearStateFiles();
    console.log("Cleaned up stale files.");
    return;
  }

  console.log(`Stopping daemon (PID ${pid})...`);
  try {
    process.kill(pid, "SIGTERM");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === "ESRCH") {
      console.log("Process already exited.");
      clearStateFiles();
      return;
    }
    if (err.code === "EPERM") {
      console.error("Permission denied. Cannot stop the daemon.");
      process.exit(1);
    }
    throw error;
  }

  if (await waitForExit(pid, 5000)) {
    console.log("Daemon stopped.");
    clearStateFiles();
    return;
  }

  if (!options.force) {
    console.error(
      "Daemon did not stop within 5 seconds.\nUse --force to send SIGKILL."
    );
    process.exit(1);
  }

  console.log("Process did not exit, sending SIGKILL...");
  try {
    process.kill(pid, "SIGKILL");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code !== "ESRCH") {
      throw error;
    }
  }
  await new Promise((resolve) => setTimeout(resolve, 500));

  if (isProcessRunning(pid)) {
    console.error("Failed to kill daemon.");
    process.exit(1);
  }
  console.log("Daemon killed. The active session, if any, was not cleaned up.");
  clearStateFiles();
}
