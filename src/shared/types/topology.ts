/**
 * Stored topology records: projects, devices, links and configuration snapshots.
 */

import type { InterfaceFacts, LinkState, VlanFacts } from "./facts";

// ============================================================================
// Projects
// ============================================================================

export interface ProjectInput {
  name: string;
  description?: string;
}

export interface Project {
  id: string;
  name: string;
  description?: string;
  /** ISO-8601 timestamps */
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Devices
// ============================================================================

export interface DeviceInput {
  hostname: string;
  role: string;
  vendor?: string;
  platform?: string;
  managementAddress?: string;
  canvasX?: number;
  canvasY?: number;
}

export interface Device {
  id: string;
  projectId: string;
  hostname: string;
  role: string;
  vendor: string;
  platform: string;
  managementAddress?: string;
  canvasX: number;
  canvasY: number;
  /** MD5 hex digest of the latest uploaded configuration */
  configHash?: string;
  createdAt: string;
  updatedAt: string;
  interfaces: InterfaceFacts[];
  vlans: VlanFacts[];
}

export const DEFAULT_DEVICE_VENDOR = "cisco";
export const DEFAULT_DEVICE_PLATFORM = "ios-xe";

/** One captured configuration text for a device. */
export interface DeviceConfigSnapshot {
  id: string;
  deviceId: string;
  content: string;
  createdAt: string;
}

// ============================================================================
// Links
// ============================================================================

export interface LinkInput {
  sourceDeviceId: string;
  sourceInterface: string;
  targetDeviceId: string;
  targetInterface: string;
  medium?: string;
  vlanAllowList?: number[];
}

/** Fields of a link that can be changed after creation. */
export type LinkUpdate = Partial<LinkInput>;

export interface Link {
  id: string;
  projectId: string;
  sourceDeviceId: string;
  sourceInterface: string;
  targetDeviceId: string;
  targetInterface: string;
  medium: string;
  vlanAllowList: number[];
  state: LinkState;
}

export const DEFAULT_LINK_MEDIUM = "ethernet";

// ============================================================================
// Project document (one per project file)
// ============================================================================

export interface ProjectDocument {
  project: Project;
  devices: Device[];
  links: Link[];
  configs: DeviceConfigSnapshot[];
}
