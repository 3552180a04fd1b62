/**
 * Single-instance lock for the daemon.
 * Two daemons writing sessions under the same output root would each
 * believe they own "the" active session, so only one may run.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { isProcessRunning } from "./daemon-paths.js";

export type LockResult =
  | { acquired: true }
  | { acquired: false; existingPid: number }
  | { acquired: false; error: string };

function readLockPid(lockPath: string): number | null {
  try {
    const pid = parseInt(fs.readFileSync(lockPath, "utf-8").trim(), 10);
    return isNaN(pid) || pid <= 0 ? null : pid;
  } catch {
    return null;
  }
}

/**
 * Attempt to acquire the lock with an exclusive create ("wx").
 */
export function acquireLock(lockPath: string, pid = process.pid): LockResult {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  try {
    fs.writeFileSync(lockPath, String(pid), { encoding: "utf-8", flag: "wx" });
    return { acquired: true };
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code !== "EEXIST") {
      return { acquired: false, error: err.message };
    }
    const existingPid = readLockPid(lockPath);
    return existingPid === null
      ? { acquired: false, error: "Invalid PID in lock file" }
      : { acquired: false, existingPid };
  }
}

/** Release the lock. Safe to call when no lock exists. */
export function releaseLock(lockPath: string): void {
  fs.rmSync(lockPath, { force: true });
}

/**
 * Remove the lock if its owner is gone (or it is unreadable).
 * Returns true if a stale lock was removed.
 */
export function cleanStaleLock(lockPath: string): boolean {
  if (!fs.existsSync(lockPath)) {
    return false;
  }
  const pid = readLockPid(lockPath);
  if (pid !== null && isProcessRunning(pid)) {
    return false;
  }
  releaseLock(lockPath);
  return true;
}

/** Clean a stale lock, then try to acquire */
export function acquireLockWithCleanup(lockPath: string, pid = process.pid): LockResult {
  cleanStaleLock(lockPath);
  return acquireLock(lockPath, pid);
}
