/**
 * Device name resolution.
 *
 * Friendly names come from the configuration tables:
 *   camera.device_names[host][index]   exact host match
 *   camera.device_names.local[index]   loopback hosts only
 *   audio.device_names[index]
 * Anything unmapped gets a synthetic name built from the class and index.
 * Resolution never throws.
 */

import type { DeviceClass } from "../types/index.js";
import type { RecordingConfig } from "../recording-config.js";

export type DeviceNameTables = Pick<RecordingConfig, "camera" | "audio">;

/** Reserved bucket for cameras attached to the coordinating machine */
export const LOCAL_HOST_BUCKET = "local";

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "localhost", "::1", LOCAL_HOST_BUCKET]);

export function isLoopbackHost(hostIdentifier: string): boolean {
  return (
    hostIdentifier.length === 0 ||
    LOOPBACK_HOSTS.has(hostIdentifier.toLowerCase())
  );
}

function lookup(
  table: Readonly<Record<string, string>> | undefined,
  deviceIndex: number
): string | undefined {
  const key = String(deviceIndex);
  if (table && Object.hasOwn(table, key)) {
    return table[key];
  }
  return undefined;
}

function hostTable(
  tables: DeviceNameTables,
  host: string
): Readonly<Record<string, string>> | undefined {
  const names = tables.camera.device_names;
  return Object.hasOwn(names, host) ? names[host] : undefined;
}

/**
 * Filename-safe encoding of a host identifier.
 * Letters, digits, "." and "-" are kept; every other character becomes
 * "_" plus two hex digits (or "_u" plus six for code points above 0xff),
 * so distinct hosts never share a token.
 */
export function hostToken(hostIdentifier: string): string {
  let token = "";
  for (const char of hostIdentifier) {
    if (/[A-Za-z0-9.-]/.test(char)) {
      token += char;
      continue;
    }
    const codePoint = char.codePointAt(0) ?? 0;
    token +=
      codePoint <= 0xff
        ? `_${codePoint.toString(16).padStart(2, "0")}`
        : `_u${codePoint.toString(16).padStart(6, "0")}`;
  }
  return token;
}

/**
 * Synthetic name for an unmapped device.
 * Distinct indices (or distinct remote hosts) never share a name.
 */
export function fallbackDeviceName(
  deviceClass: DeviceClass,
  hostIdentifier: string,
  deviceIndex: number
): string {
  if (deviceClass === "audio") {
    return `audio${deviceIndex}`;
  }
  if (isLoopbackHost(hostIdentifier)) {
    return `camera_cam${deviceIndex}`;
  }
  return `camera_${hostToken(hostIdentifier)}_cam${deviceIndex}`;
}

/**
 * Resolve the friendly name of a device.
 * `hostIdentifier` is ignored for audio devices.
 */
export function resolveDeviceName(
  deviceClass: DeviceClass,
  hostIdentifier: string,
  deviceIndex: number,
  tables: DeviceNameTables
): string {
  if (deviceClass === "audio") {
    return (
      lookup(tables.audio.device_names, deviceIndex) ??
      fallbackDeviceName("audio", hostIdentifier, deviceIndex)
    );
  }

  const exact = lookup(hostTable(tables, hostIdentifier), deviceIndex);
  if (exact !== undefined) {
    return exact;
  }

  if (isLoopbackHost(hostIdentifier)) {
    const local = lookup(hostTable(tables, LOCAL_HOST_BUCKET), deviceIndex);
    if (local !== undefined) {
      return local;
    }
  }

  return fallbackDeviceName("camera", hostIdentifier, deviceIndex);
}
