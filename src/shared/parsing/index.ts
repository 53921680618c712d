/**
 * Configuration text parsing
 *
 * Environment-free extraction pipeline: raw configuration text is split into
 * an indentation tree, then interpreted into DeviceFacts.
 *
 * @example
 * ```typescript
 * import { extractDeviceFacts } from '../shared/parsing';
 * const facts = extractDeviceFacts(configText, { logger });
 * ```
 *
 * For internal utilities, import directly from sub-modules:
 * - `./LineTreeParser` - indentation tree and pattern queries
 * - `./VlanRangeExpander` - VLAN list expansion
 * - `./NetworkPrefix` - canonical network computation
 * - `./platformSignatures` - vendor/platform banner table
 */

export { extractDeviceFacts, extractFromTree, selectManagementAddress } from "./DeviceFactsExtractor";
export { LineTree, parseLineTree } from "./LineTreeParser";
export { expandVlanRange, intersectVlans, parseVlanId } from "./VlanRangeExpander";
export { normalizeNetwork, formatNetwork, sameNetwork } from "./NetworkPrefix";

export type { CanonicalNetwork, AddressFamily } from "./NetworkPrefix";
export type { ExtractOptions, LineNode, ParserLogger } from "./types";
export { nullLogger } from "./types";
