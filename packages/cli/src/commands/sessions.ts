/**
 * Sessions commands - browse the daemon's session history.
 */

import type {
  SessionHistoryStatus,
  SessionManifest,
  SessionRecord,
} from "@capture-session/core";
import { daemonRequest, exitWithError } from "../api.js";
import { formatSessionTable } from "../format.js";

export async function sessionsListCommand(options: {
  status?: SessionHistoryStatus;
}): Promise<void> {
  try {
    const query = options.status ? `?status=${options.status}` : "";
    const sessions = await daemonRequest<SessionRecord[]>(
      "GET",
      `/api/sessions${query}`
    );
    for (const line of formatSessionTable(sessions)) {
      console.log(line);
    }
  } catch (error) {
    exitWithError(error);
  }
}

export async function sessionsShowCommand(id: string): Promise<void> {
  try {
    const session = await daemonRequest<
      SessionRecord & { manifest: SessionManifest | null }
    >("GET", `/api/sessions/${encodeURIComponent(id)}`);

    console.log("Session Details");
    console.log("===============");
    console.log(`ID:         ${session.id}`);
    console.log(`Status:     ${session.status}`);
    console.log(`Mode:       ${session.mode}`);
    console.log(`Directory:  ${session.sessionDirectory}`);
    console.log(`Started:    ${session.startedAt}`);
    console.log(`Ended:      ${session.endedAt ?? "N/A"}`);
    console.log(`Files:      ${session.fileCount}`);

    if (session.manifest) {
      for (const filename of session.manifest.files_created) {
        console.log(`  ${filename}`);
      }
      const keys = Object.keys(session.manifest.metadata);
      if (keys.length > 0) {
        console.log("Metadata:");
        for (const key of keys) {
          console.log(`  ${key}: ${JSON.stringify(session.manifest.metadata[key])}`);
        }
      }
    }
  } catch (error) {
    exitWithError(error);
  }
}
