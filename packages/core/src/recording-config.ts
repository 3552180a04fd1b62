/**
 * Recording configuration file.
 *
 * The file holds the friendly-name tables, the output layout and the
 * per-mode device lists. It is deep-merged over the defaults below and
 * validated with zod, so a partial file only needs the keys it changes.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { isSafePathSegment } from "./naming/timestamp.js";

const deviceIndexKey = z
  .string()
  .regex(/^\d+$/, "device index keys must be non-negative integers");

const deviceIndex = z.number().int().nonnegative();

const extension = z
  .string()
  .regex(/^[A-Za-z0-9]+$/, "extensions are alphanumeric, without a dot");

/** Friendly names end up inside filenames */
const friendlyName = z
  .string()
  .min(1)
  .refine(isSafePathSegment, "friendly names must be a single path segment (no / or \\)");

const friendlyNames = z.record(deviceIndexKey, friendlyName);

export const recordingConfigSchema = z.object({
  recording: z.object({
    mode: z.enum(["standalone", "sync"]),
    /** Recording length in seconds, shared by every device */
    duration: z.number().positive(),
    base_output_dir: z.string().min(1),
    /** strftime subset: %Y %m %d %H %M %S %% */
    timestamp_format: z.string().min(1),
    /** Seconds to wait before starting audio in standalone mode */
    standalone_delay: z.number().nonnegative(),
    /** Seconds to wait before starting audio in sync mode */
    sync_delay: z.number().nonnegative(),
  }),
  camera: z.object({
    /** host (or "local") -> device index -> friendly name */
    device_names: z.record(z.string().min(1), friendlyNames),
    /** host -> device indices recorded in sync mode; the first is the master */
    ip_devices: z.record(z.string().min(1), z.array(deviceIndex)),
    standalone_device: deviceIndex,
    extension,
  }),
  audio: z.object({
    /** device index -> friendly name */
    device_names: friendlyNames,
    input_device_index: z.array(deviceIndex),
    extension,
  }),
});

export type RecordingConfig = z.infer<typeof recordingConfigSchema>;

export function getDefaultRecordingConfig(): RecordingConfig {
  return {
    recording: {
      mode: "sync",
      duration: 10,
      base_output_dir: "recordings",
      timestamp_format: "%Y-%m-%d_%H-%M-%S",
      standalone_delay: 0,
      sync_delay: 0.86,
    },
    camera: {
      device_names: {
        "127.0.0.1": {
          "0": "master_cam",
          "2": "left_cam",
          "3": "right_cam",
        },
        local: {
          "1": "standalone_cam",
        },
      },
      ip_devices: {
        "127.0.0.1": [0, 2, 3],
      },
      standalone_device: 1,
      extension: "mkv",
    },
    audio: {
      device_names: {
        "1": "main_mic",
        "5": "backup_mic",
        "6": "wireless_mic",
      },
      input_device_index: [1],
      extension: "wav",
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge `override` over `base`.
 * Objects merge key by key; arrays and scalars replace.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = key in merged ? mergeConfig(merged[key], value) : value;
  }
  return merged;
}

/**
 * Validate a raw configuration object merged over the defaults.
 * @throws ConfigError naming the first offending field
 */
export function parseRecordingConfig(
  raw: unknown,
  source = "<inline>"
): RecordingConfig {
  const result = recordingConfigSchema.safeParse(
    mergeConfig(getDefaultRecordingConfig(), raw)
  );
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(source, `${field}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

/**
 * Load the recording configuration file.
 * A missing file yields the defaults.
 *
 * @throws ConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadRecordingConfig(filePath: string): RecordingConfig {
  if (!fs.existsSync(filePath)) {
    return getDefaultRecordingConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(filePath, errorMessage(error), { cause: error });
  }
  return parseRecordingConfig(raw, filePath);
}

/**
 * Write the default configuration to disk.
 * Returns false without touching the file if it exists and `force` is unset.
 */
export function writeDefaultRecordingConfig(
  filePath: string,
  options: { force?: boolean } = {}
): boolean {
  if (fs.existsSync(filePath) && !options.force) {
    return false;
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(
    filePath,
    JSON.stringify(getDefaultRecordingConfig(), null, 2) + "\n",
    "utf-8"
  );
  return true;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Immutable copy of a configuration, taken when a session is created.
 * Later edits to the source object do not reach the snapshot.
 */
export function snapshotRecordingConfig(
  config: RecordingConfig
): RecordingConfig {
  return deepFreeze(structuredClone(config));
}
