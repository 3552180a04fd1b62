/**
 * Device plan for a session: which cameras and microphones the
 * configuration says take part in each recording mode.
 */

import type { DeviceDescriptor, RecordingMode } from "../types/index.js";
import type { RecordingConfig } from "../recording-config.js";
import { LOCAL_HOST_BUCKET } from "../naming/index.js";

/**
 * List the devices recorded in `mode`.
 * sync: every (host, index) of camera.ip_devices; the first one is the master.
 * standalone: camera.standalone_device on the local host.
 * Audio inputs are recorded in both modes, each starting after the
 * mode's configured delay (recording.standalone_delay or sync_delay).
 */
export function planDevices(
  config: RecordingConfig,
  mode: RecordingMode
): DeviceDescriptor[] {
  const devices: DeviceDescriptor[] = [];

  if (mode === "standalone") {
    devices.push({
      deviceClass: "camera",
      role: "standalone",
      hostIdentifier: LOCAL_HOST_BUCKET,
      deviceIndex: config.camera.standalone_device,
    });
  } else {
    for (const [host, indices] of Object.entries(config.camera.ip_devices)) {
      for (const deviceIndex of indices) {
        devices.push({
          deviceClass: "camera",
          role: devices.length === 0 ? "master" : "subordinate",
          hostIdentifier: host,
          deviceIndex,
        });
      }
    }
  }

  const startDelay =
    mode === "standalone"
      ? config.recording.standalone_delay
      : config.recording.sync_delay;
  for (const deviceIndex of config.audio.input_device_index) {
    devices.push({ deviceClass: "audio", deviceIndex, startDelay });
  }

  return devices;
}

export function countPlannedDevices(
  config: RecordingConfig,
  mode: RecordingMode
): number {
  return planDevices(config, mode).length;
}
