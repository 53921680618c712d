/**
 * Device facts extraction from CLI-style configuration text.
 *
 * Walks the line tree with fixed rule tables. Every rule degrades on its own:
 * a malformed line leaves its field at the default and extraction carries on,
 * so a DeviceFacts is always produced.
 */

import type { DeviceFacts, InterfaceFacts, VlanFacts } from "../types/facts";
import { SWITCHPORT_MODES, createInterfaceFacts } from "../types/facts";

import { parseLineTree } from "./LineTreeParser";
import type { LineTree } from "./LineTreeParser";
import { COMMENT_MARKERS, PLATFORM_SIGNATURES, SIGNATURE_SCAN_LINES } from "./platformSignatures";
import type { ExtractOptions, LineNode, ParserLogger } from "./types";
import { nullLogger } from "./types";
import { expandVlanRange, parseVlanId } from "./VlanRangeExpander";

// ============================================================================
// Patterns
// ============================================================================

const HOSTNAME_LINE = /^hostname\s+\S+/;
const INTERFACE_LINE = /^interface\s+\S+/;
const VLAN_LINE = /^vlan\s+\S+/;
const WHITESPACE = /\s+/;

const LOOPBACK_MARKER = "Loopback";

function secondToken(text: string): string | undefined {
  return text.split(WHITESPACE)[1];
}

// ============================================================================
// Rule Tables
// ============================================================================

/**
 * A child-line rule: when the pattern matches a child of the block, the setter
 * updates the record. Rules run in table order for each child, children in
 * document order, so a later line overwrites an earlier one.
 */
interface ChildRule<T> {
  pattern: RegExp;
  apply: (target: T, match: RegExpExecArray, logger: ParserLogger) => void;
}

export const INTERFACE_RULES: readonly ChildRule<InterfaceFacts>[] = [
  {
    pattern: /^description(?:\s+(.*))?$/,
    apply: (iface, match) => {
      iface.description = (match[1] ?? "").trim();
    }
  },
  {
    pattern: /^shutdown$/,
    apply: (iface) => {
      iface.adminState = "down";
    }
  },
  {
    pattern: /^ip address\s+(\S+)\s+(\S+)/,
    apply: (iface, match) => {
      iface.address = match[1];
      iface.mask = match[2];
    }
  },
  {
    pattern: /^switchport mode\s+(\S+)/,
    apply: (iface, match, logger) => {
      const mode = SWITCHPORT_MODES.find((m) => m === match[1]);
      if (mode) {
        iface.mode = mode;
      } else {
        logger.debug(`Ignoring unsupported switchport mode "${match[1]}" on ${iface.name}`);
      }
    }
  },
  {
    pattern: /^switchport access vlan\s+(\S+)/,
    apply: (iface, match, logger) => {
      const vlan = parseVlanId(match[1]);
      if (vlan === undefined) {
        logger.debug(`Ignoring access VLAN "${match[1]}" on ${iface.name}`);
        return;
      }
      iface.accessVlan = vlan;
    }
  },
  {
    pattern: /^switchport trunk allowed vlan\s+(.+)$/,
    apply: (iface, match, logger) => {
      iface.trunkAllowedVlans = expandVlanRange(match[1], logger);
    }
  }
];

export const VLAN_RULES: readonly ChildRule<VlanFacts>[] = [
  {
    pattern: /^name\s+(.+)$/,
    apply: (vlan, match) => {
      vlan.name = match[1].trim();
    }
  }
];

function applyChildRules<T>(
  node: LineNode,
  target: T,
  rules: readonly ChildRule<T>[],
  logger: ParserLogger
): void {
  for (const child of node.children) {
    for (const rule of rules) {
      const match = rule.pattern.exec(child.text);
      if (match) rule.apply(target, match, logger);
    }
  }
}

// ============================================================================
// Field Extractors
// ============================================================================

export function extractHostname(tree: LineTree): string | undefined {
  const [first] = tree.rootsMatching(HOSTNAME_LINE);
  return first ? secondToken(first.text) : undefined;
}

const METADATA_LINE = new RegExp(
  `^[${COMMENT_MARKERS.map((marker) => `\\${marker}`).join("")}]+\\s*([A-Za-z_-]+)\\s*:\\s*(.*\\S)\\s*$`
);

/**
 * Guess vendor and platform from the head of the raw text.
 * Comment metadata ("! vendor: cisco", "# model: C9300") and banner
 * substrings both apply; the last signal in document order wins per field.
 */
export function detectPlatform(text: string): { vendor?: string; platform?: string } {
  const result: { vendor?: string; platform?: string } = {};
  const lines = text.split(/\r?\n/).slice(0, SIGNATURE_SCAN_LINES);

  for (const raw of lines) {
    const line = raw.trim();

    const metadata = METADATA_LINE.exec(line);
    if (metadata) {
      const key = metadata[1].toLowerCase();
      if (key === "vendor") result.vendor = metadata[2];
      if (key === "model") result.platform = metadata[2];
    }

    for (const signature of PLATFORM_SIGNATURES) {
      if (line.includes(signature.match)) {
        result[signature.field] = signature.value;
      }
    }
  }

  return result;
}

/**
 * Build one InterfaceFacts per top-level "interface" block.
 * Duplicate names keep the position of the first block and the fields of the
 * last one.
 */
export function extractInterfaces(tree: LineTree, logger: ParserLogger = nullLogger): InterfaceFacts[] {
  const byName = new Map<string, InterfaceFacts>();

  for (const node of tree.rootsMatching(INTERFACE_LINE)) {
    const name = secondToken(node.text);
    if (!name) continue;

    const iface = createInterfaceFacts(name);
    applyChildRules(node, iface, INTERFACE_RULES, logger);
    if (byName.has(name)) {
      logger.debug(`Interface ${name} defined again at line ${node.lineNumber}; last block wins`);
    }
    byName.set(name, iface);
  }

  return Array.from(byName.values());
}

export function extractVlans(tree: LineTree, logger: ParserLogger = nullLogger): VlanFacts[] {
  const byId = new Map<number, VlanFacts>();

  for (const node of tree.rootsMatching(VLAN_LINE)) {
    const token = secondToken(node.text) ?? "";
    const id = parseVlanId(token);
    if (id === undefined) {
      logger.debug(`Skipping VLAN block with id "${token}" at line ${node.lineNumber}`);
      continue;
    }

    const vlan: VlanFacts = { id, name: "" };
    applyChildRules(node, vlan, VLAN_RULES, logger);
    byId.set(id, vlan);
  }

  return Array.from(byId.values());
}

/**
 * Pick the management address in one forward pass.
 * The first loopback with an address locks the choice; until then the first
 * interface with an address is held as a provisional candidate.
 */
export function selectManagementAddress(interfaces: readonly InterfaceFacts[]): string | undefined {
  let selected: string | undefined;
  let locked = false;

  for (const iface of interfaces) {
    if (!iface.address || locked) continue;

    if (iface.name.includes(LOOPBACK_MARKER)) {
      selected = iface.address;
      locked = true;
    } else if (selected === undefined) {
      selected = iface.address;
    }
  }

  return selected;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Extract structured facts from a parsed tree plus the raw text it came from.
 */
export function extractFromTree(tree: LineTree, text: string, options: ExtractOptions = {}): DeviceFacts {
  const logger = options.logger ?? nullLogger;
  const interfaces = extractInterfaces(tree, logger);
  const { vendor, platform } = detectPlatform(text);

  const facts: DeviceFacts = {
    interfaces,
    vlans: extractVlans(tree, logger)
  };

  const hostname = extractHostname(tree);
  if (hostname !== undefined) facts.hostname = hostname;
  if (vendor !== undefined) facts.vendor = vendor;
  if (platform !== undefined) facts.platform = platform;

  const managementAddress = selectManagementAddress(interfaces);
  if (managementAddress !== undefined) facts.managementAddress = managementAddress;

  return facts;
}

/**
 * Extract structured facts from one configuration text.
 */
export function extractDeviceFacts(text: string, options: ExtractOptions = {}): DeviceFacts {
  const tree = parseLineTree(text);
  const facts = extractFromTree(tree, text, options);
  (options.logger ?? nullLogger).debug(
    `Extracted ${facts.interfaces.length} interfaces and ${facts.vlans.length} VLANs from ${tree.size()} lines`
  );
  return facts;
}
