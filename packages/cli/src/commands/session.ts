/**
 * Session commands - drive the daemon's active recording session.
 *
 * A recording orchestrator typically runs:
 *   session create -> session plan -> (capture) -> session register ... -> session finalize
 * and `session cleanup` from its failure path.
 */

import type {
  CleanupReport,
  PlannedDevice,
  RecordingMode,
  SessionInfo,
  SessionManifest,
} from "@capture-session/core";
import { daemonRequest, exitWithError } from "../api.js";
import { parseDeviceIndex, parseMetadataPairs } from "../args.js";
import { formatPlan } from "../format.js";

function printSession(session: SessionInfo): void {
  console.log(`ID:         ${session.id}`);
  console.log(`Timestamp:  ${session.timestamp}`);
  console.log(`Mode:       ${session.mode}`);
  console.log(`Directory:  ${session.sessionDirectory}`);
  console.log(`Files:      ${session.filesCreated.length}`);
  for (const filename of session.filesCreated) {
    console.log(`  ${filename}`);
  }
}

export async function sessionCreateCommand(options: {
  timestamp?: string;
  mode?: RecordingMode;
}): Promise<void> {
  try {
    const session = await daemonRequest<SessionInfo>("POST", "/api/session", {
      timestamp: options.timestamp,
      mode: options.mode,
    });
    console.log(session.sessionDirectory);
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionCurrentCommand(options: {
  json?: boolean;
}): Promise<void> {
  try {
    const { session } = await daemonRequest<{ session: SessionInfo | null }>(
      "GET",
      "/api/session"
    );
    if (options.json) {
      console.log(JSON.stringify(session, null, 2));
      return;
    }
    if (!session) {
      console.log("No active session.");
      return;
    }
    printSession(session);
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionPlanCommand(): Promise<void> {
  try {
    const { devices } = await daemonRequest<{ devices: PlannedDevice[] }>(
      "GET",
      "/api/session/plan"
    );
    for (const line of formatPlan(devices)) {
      console.log(line);
    }
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionCameraNameCommand(
  host: string,
  index: string,
  options: { role: string }
): Promise<void> {
  try {
    const { filename } = await daemonRequest<{ filename: string }>(
      "POST",
      "/api/session/filenames/camera",
      { role: options.role, host, index: parseDeviceIndex(index) }
    );
    console.log(filename);
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionAudioNameCommand(index: string): Promise<void> {
  try {
    const { filename } = await daemonRequest<{ filename: string }>(
      "POST",
      "/api/session/filenames/audio",
      { index: parseDeviceIndex(index) }
    );
    console.log(filename);
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionRegisterCommand(filenames: string[]): Promise<void> {
  try {
    let session: SessionInfo | null = null;
    for (const filename of filenames) {
      session = await daemonRequest<SessionInfo>("POST", "/api/session/files", {
        filename,
      });
    }
    if (session) {
      console.log(`Registered ${filenames.length} file(s), ${session.filesCreated.length} total.`);
    }
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionMetaCommand(pairs: string[]): Promise<void> {
  try {
    const session = await daemonRequest<SessionInfo>(
      "PATCH",
      "/api/session/metadata",
      parseMetadataPairs(pairs)
    );
    console.log(JSON.stringify(session.metadata, null, 2));
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionFinalizeCommand(options: {
  meta: string[];
}): Promise<void> {
  try {
    const manifest = await daemonRequest<SessionManifest>(
      "POST",
      "/api/session/finalize",
      { metadata: parseMetadataPairs(options.meta) }
    );
    console.log(
      `Finalized ${manifest.session_dir} (${manifest.total_files} files)`
    );
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionCleanupCommand(): Promise<void> {
  try {
    const report = await daemonRequest<CleanupReport>(
      "POST",
      "/api/session/cleanup"
    );
    if (!report.cleaned) {
      console.log("No active session, nothing to clean up.");
      return;
    }
    console.log(`Removed ${report.removedFiles.length} file(s).`);
    console.log(
      report.removedDirectory
        ? "Removed the session directory."
        : report.markerWritten
          ? "Kept the session directory and marked it aborted."
          : "Kept the session directory."
    );
    for (const failure of report.failures) {
      console.error(`  failed: ${failure}`);
    }
  } catch (error) {
    exitWithError(error);
  }
}
