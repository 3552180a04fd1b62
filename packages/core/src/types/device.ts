/**
 * Device descriptors used for file naming.
 */

export type DeviceClass = "camera" | "audio";

/**
 * Role of a camera within a sync group.
 * "sub" is accepted as an alias of "subordinate".
 */
export type CameraRole = "master" | "subordinate" | "sub" | "standalone";

export const CAMERA_ROLES: readonly CameraRole[] = [
  "master",
  "subordinate",
  "sub",
  "standalone",
];

/** Short token embedded in camera filenames */
export type RoleTag = "master" | "sub" | "standalone";

export interface CameraDescriptor {
  deviceClass: "camera";
  role: CameraRole;
  /** Loopback/local marker or network address of the capture host */
  hostIdentifier: string;
  deviceIndex: number;
}

export interface AudioDescriptor {
  deviceClass: "audio";
  deviceIndex: number;
  /** Seconds to wait after the cameras start before recording audio */
  startDelay: number;
}

export type DeviceDescriptor = CameraDescriptor | AudioDescriptor;

/** A device planned for the active session, with its canonical filename */
export interface PlannedDevice {
  descriptor: DeviceDescriptor;
  friendlyName: string;
  filename: string;
}
