/**
 * Names command - resolve friendly device names from the local
 * configuration file, without a daemon.
 */

import {
  loadConfig,
  loadRecordingConfig,
  resolveDeviceName,
  type DeviceClass,
} from "@capture-session/core";
import { exitWithError } from "../api.js";
import { parseDeviceIndex } from "../args.js";

export function namesResolveCommand(
  deviceClass: DeviceClass,
  index: string,
  options: { host: string }
): void {
  try {
    const config = loadRecordingConfig(loadConfig().recordingConfigPath);
    console.log(
      resolveDeviceName(deviceClass, options.host, parseDeviceIndex(index), config)
    );
  } catch (error) {
    exitWithError(error);
  }
}
