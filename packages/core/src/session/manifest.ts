/**
 * Session manifest (session_info.json).
 *
 * Written once per finalized session. The document is written to a
 * temporary file and renamed over the final path, so readers either see a
 * complete manifest or none.
 */

import * as fs from "node:fs";
import { z } from "zod";
import type {
  MetadataValue,
  SessionInfo,
  SessionManifest,
} from "../types/index.js";
import type { RecordingConfig } from "../recording-config.js";
import { SessionError, errorMessage } from "../errors.js";
import { getManifestPath } from "../naming/index.js";
import { createLogger } from "../logger.js";

const logger = createLogger("Manifest");

export const MANIFEST_SCHEMA_VERSION = 1;

const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(metadataValueSchema),
    z.record(metadataValueSchema),
  ])
);

const manifestSchema = z.object({
  schema_version: z.literal(MANIFEST_SCHEMA_VERSION),
  session_id: z.string(),
  timestamp: z.string(),
  mode: z.enum(["standalone", "sync"]),
  session_dir: z.string(),
  files_created: z.array(z.string()),
  total_files: z.number().int().nonnegative(),
  created_at: z.string(),
  finalized_at: z.string(),
  recording_config: z.object({
    mode: z.enum(["standalone", "sync"]),
    duration: z.number(),
    base_output_dir: z.string(),
  }),
  device_names: z.object({
    camera: z.record(z.record(z.string())),
    audio: z.record(z.string()),
  }),
  metadata: z.record(metadataValueSchema),
});

/**
 * Build the manifest document for a session about to be finalized.
 * `session.metadata` must already contain the caller-supplied entries.
 */
export function buildManifest(
  session: SessionInfo,
  config: RecordingConfig,
  finalizedAt: string
): SessionManifest {
  return {
    schema_version: MANIFEST_SCHEMA_VERSION,
    session_id: session.id,
    timestamp: session.timestamp,
    mode: session.mode,
    session_dir: session.sessionDirectory,
    files_created: [...session.filesCreated],
    total_files: session.filesCreated.length,
    created_at: session.createdAt,
    finalized_at: finalizedAt,
    recording_config: {
      mode: config.recording.mode,
      duration: config.recording.duration,
      base_output_dir: config.recording.base_output_dir,
    },
    device_names: {
      camera: structuredClone(config.camera.device_names),
      audio: structuredClone(config.audio.device_names),
    },
    metadata: structuredClone(session.metadata),
  };
}

/**
 * Write the manifest atomically into `sessionDirectory`.
 * Returns the manifest path.
 *
 * @throws SessionError MANIFEST_WRITE_FAILED
 */
export function writeManifest(
  manifest: SessionManifest,
  sessionDirectory: string
): string {
  const manifestPath = getManifestPath(sessionDirectory);
  const tempPath = `${manifestPath}.tmp`;

  try {
    fs.writeFileSync(tempPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
    fs.renameSync(tempPath, manifestPath);
  } catch (error) {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (removeError) {
      logger.warn(`Could not remove ${tempPath}: ${errorMessage(removeError)}`);
    }
    throw new SessionError(
      "MANIFEST_WRITE_FAILED",
      `Failed to write session manifest ${manifestPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return manifestPath;
}

/**
 * Read a session manifest back.
 * Returns null if the file doesn't exist or doesn't match the schema.
 */
export function readManifest(sessionDirectory: string): SessionManifest | null {
  const manifestPath = getManifestPath(sessionDirectory);

  try {
    if (!fs.existsSync(manifestPath)) {
      return null;
    }
    const result = manifestSchema.safeParse(
      JSON.parse(fs.readFileSync(manifestPath, "utf-8"))
    );
    if (!result.success) {
      logger.warn(`Invalid manifest at ${manifestPath}, ignoring`);
      return null;
    }
    return result.data;
  } catch (error) {
    logger.warn(`Failed to read ${manifestPath}: ${errorMessage(error)}`);
    return null;
  }
}
