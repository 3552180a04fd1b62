/**
 * Daemon state files: PID, lock and log under ~/.capture-session/.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

export interface DaemonPaths {
  baseDir: string;
  pidFile: string;
  lockFile: string;
  logFile: string;
}

export function getDaemonPaths(baseDir = path.join(os.homedir(), ".capture-session")): DaemonPaths {
  return {
    baseDir,
    pidFile: path.join(baseDir, "capture-session.pid"),
    lockFile: path.join(baseDir, "capture-session.lock"),
    logFile: path.join(baseDir, "capture-session.log"),
  };
}

/**
 * Read a PID file.
 * Returns null if the file doesn't exist or doesn't hold a positive integer.
 */
export function readPidFile(pidPath = getDaemonPaths().pidFile): number | null {
  let content: string;
  try {
    content = fs.readFileSync(pidPath, "utf-8").trim();
  } catch {
    return null;
  }
  const pid = parseInt(content, 10);
  return isNaN(pid) || pid <= 0 ? null : pid;
}

/** Write a PID file, creating the parent directory if needed */
export function writePidFile(pid: number, pidPath = getDaemonPaths().pidFile): void {
  fs.mkdirSync(path.dirname(pidPath), { recursive: true });
  fs.writeFileSync(pidPath, String(pid), "utf-8");
}

export function removePidFile(pidPath = getDaemonPaths().pidFile): void {
  fs.rmSync(pidPath, { force: true });
}

/**
 * Check whether a process exists.
 * kill(pid, 0) sends nothing; EPERM means it exists under another user.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    return err.code === "EPERM";
  }
}

export interface DaemonStatus {
  running: boolean;
  pid: number | null;
}

export function checkDaemonStatus(pidPath?: string): DaemonStatus {
  const pid = readPidFile(pidPath);
  if (pid === null || !isProcessRunning(pid)) {
    return { running: false, pid: null };
  }
  return { running: true, pid };
}
