/**
 * Device fact type definitions.
 * These types describe what the extractor derives from one device's
 * configuration text and what the link validator consumes.
 */

// ============================================================================
// Interface and VLAN Facts
// ============================================================================

/** Switching mode of an interface. */
export type SwitchportMode = "access" | "trunk";

/** Administrative state. "down" only when a shutdown directive is present. */
export type AdminState = "up" | "down";

export const SWITCHPORT_MODES: readonly SwitchportMode[] = ["access", "trunk"];

/**
 * One interface block as interpreted from configuration text.
 */
export interface InterfaceFacts {
  /** Interface name, unique within one DeviceFacts (e.g., "GigabitEthernet0/1") */
  name: string;
  description: string;
  mode: SwitchportMode;
  /** VLAN carried in access mode */
  accessVlan?: number;
  /** VLANs allowed in trunk mode, ascending and unique */
  trunkAllowedVlans: number[];
  address?: string;
  /** Dotted-decimal netmask or "/len" prefix form */
  mask?: string;
  adminState: AdminState;
}

export interface VlanFacts {
  id: number;
  name: string;
}

/**
 * Structured result of interpreting one device's configuration text.
 * Always produced fresh; replaces any facts previously stored for the device.
 */
export interface DeviceFacts {
  hostname?: string;
  vendor?: string;
  platform?: string;
  managementAddress?: string;
  interfaces: InterfaceFacts[];
  vlans: VlanFacts[];
}

/**
 * Create an interface record with every field at its default.
 */
export function createInterfaceFacts(name: string): InterfaceFacts {
  return {
    name,
    description: "",
    mode: "access",
    trunkAllowedVlans: [],
    adminState: "up"
  };
}

// ============================================================================
// Links
// ============================================================================

/**
 * Operational state of a link.
 * "pending" is the value before any validation has run.
 */
export type LinkState = "pending" | "up" | "down";
