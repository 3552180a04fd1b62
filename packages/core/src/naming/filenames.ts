/**
 * Canonical recording filenames.
 *   camera: {timestamp}-{roleTag}-{friendlyName}.{ext}
 *   audio:  {timestamp}-{friendlyName}.{ext}
 */

import type { CameraRole, RoleTag } from "../types/index.js";

const ROLE_TAGS: Record<CameraRole, RoleTag> = {
  master: "master",
  subordinate: "sub",
  sub: "sub",
  standalone: "standalone",
};

export function roleTag(role: CameraRole): RoleTag {
  return ROLE_TAGS[role];
}

export function buildCameraFilename(
  timestamp: string,
  role: CameraRole,
  friendlyName: string,
  extension: string
): string {
  return `${timestamp}-${roleTag(role)}-${friendlyName}.${extension}`;
}

export function buildAudioFilename(
  timestamp: string,
  friendlyName: string,
  extension: string
): string {
  return `${timestamp}-${friendlyName}.${extension}`;
}
