/**
 * Config commands - inspect, create and reload the recording configuration.
 */

import {
  loadConfig,
  loadRecordingConfig,
  writeDefaultRecordingConfig,
} from "@capture-session/core";
import { daemonRequest, exitWithError } from "../api.js";

export function configShowCommand(): void {
  const { recordingConfigPath } = loadConfig();
  try {
    const config = loadRecordingConfig(recordingConfigPath);
    console.log(`# ${recordingConfigPath}`);
    console.log(JSON.stringify(config, null, 2));
  } catch (error) {
    exitWithError(error);
  }
}

export function configInitCommand(options: { force?: boolean }): void {
  const { recordingConfigPath } = loadConfig();
  try {
    if (writeDefaultRecordingConfig(recordingConfigPath, options)) {
      console.log(`Wrote default configuration to ${recordingConfigPath}`);
    } else {
      console.log(
        `${recordingConfigPath} already exists. Use --force to overwrite it.`
      );
    }
  } catch (error) {
    exitWithError(error);
  }
}

export async function configReloadCommand(): Promise<void> {
  try {
    const { path } = await daemonRequest<{ path: string }>(
      "POST",
      "/api/config/reload"
    );
    console.log(`Daemon reloaded ${path}; the change applies to the next session.`);
  } catch (error) {
    exitWithError(error);
  }
}
