/**
 * Network-prefix normalization for subnet comparison.
 *
 * An address and a mask expression ("255.255.255.0", "/24", "24", or a
 * wildcard mask such as "0.0.0.255") are combined into the canonical network:
 * the address with host bits zeroed plus the prefix length. IPv6 addresses are
 * accepted with prefix-length masks. Malformed input yields undefined.
 */

export type AddressFamily = 4 | 6;

export interface CanonicalNetwork {
  family: AddressFamily;
  /** Network address with host bits zeroed, in canonical text form */
  network: string;
  prefixLength: number;
}

const IPV4_BITS = 32;
const IPV6_BITS = 128;
const IPV6_HEXTETS = 8;
const DECIMAL_OCTET = /^(0|[1-9]\d{0,2})$/;
const HEXTET = /^[0-9a-fA-F]{1,4}$/;
const PREFIX_DIGITS = /^\d{1,3}$/;

// ============================================================================
// IPv4
// ============================================================================

function parseIpv4(text: string): number | undefined {
  const octets = text.split(".");
  if (octets.length !== 4) return undefined;

  let value = 0;
  for (const octet of octets) {
    if (!DECIMAL_OCTET.test(octet)) return undefined;
    const n = Number.parseInt(octet, 10);
    if (n > 255) return undefined;
    value = value * 256 + n;
  }
  return value;
}

function formatIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join(".");
}

function ipv4MaskFromPrefix(prefixLength: number): number {
  return prefixLength === 0 ? 0 : (0xffffffff << (IPV4_BITS - prefixLength)) >>> 0;
}

/**
 * Prefix length of a contiguous netmask, or undefined when the bits are not
 * a run of ones followed by a run of zeros.
 */
function prefixFromNetmask(mask: number): number | undefined {
  for (let prefixLength = 0; prefixLength <= IPV4_BITS; prefixLength++) {
    if (ipv4MaskFromPrefix(prefixLength) === mask) return prefixLength;
  }
  return undefined;
}

function parsePrefixLength(text: string, maxBits: number): number | undefined {
  if (!PREFIX_DIGITS.test(text)) return undefined;
  const value = Number.parseInt(text, 10);
  return value <= maxBits ? value : undefined;
}

function ipv4PrefixFromMask(mask: string): number | undefined {
  if (mask.startsWith("/")) return parsePrefixLength(mask.slice(1), IPV4_BITS);
  if (PREFIX_DIGITS.test(mask)) return parsePrefixLength(mask, IPV4_BITS);

  const maskValue = parseIpv4(mask);
  if (maskValue === undefined) return undefined;
  // Netmask first, then the inverted (wildcard/host) form
  return prefixFromNetmask(maskValue) ?? prefixFromNetmask((~maskValue) >>> 0);
}

function normalizeIpv4(address: string, mask: string): CanonicalNetwork | undefined {
  const addressValue = parseIpv4(address);
  const prefixLength = ipv4PrefixFromMask(mask);
  if (addressValue === undefined || prefixLength === undefined) return undefined;

  const network = (addressValue & ipv4MaskFromPrefix(prefixLength)) >>> 0;
  return { family: 4, network: formatIpv4(network), prefixLength };
}

// ============================================================================
// IPv6
// ============================================================================

/**
 * Parse colon-separated groups. A dotted IPv4 group is taken only as the last
 * group, and only when that group ends the whole address.
 */
function parseHextets(parts: string[], endsAddress: boolean): number[] | undefined {
  const hextets: number[] = [];
  for (const [index, part] of parts.entries()) {
    const isLast = index === parts.length - 1;
    if (endsAddress && isLast && part.includes(".")) {
      const v4 = parseIpv4(part);
      if (v4 === undefined) return undefined;
      hextets.push((v4 >>> 16) & 0xffff, v4 & 0xffff);
      continue;
    }
    if (!HEXTET.test(part)) return undefined;
    hextets.push(Number.parseInt(part, 16));
  }
  return hextets;
}

function parseIpv6(text: string): number[] | undefined {
  const halves = text.split("::");
  if (halves.length > 2) return undefined;

  if (halves.length === 1) {
    const hextets = parseHextets(text.split(":"), true);
    return hextets?.length === IPV6_HEXTETS ? hextets : undefined;
  }

  const head = halves[0] === "" ? [] : parseHextets(halves[0].split(":"), false);
  const tail = halves[1] === "" ? [] : parseHextets(halves[1].split(":"), true);
  if (!head || !tail) return undefined;

  const missing = IPV6_HEXTETS - head.length - tail.length;
  if (missing < 1) return undefined;
  return [...head, ...new Array<number>(missing).fill(0), ...tail];
}

/**
 * Compressed text form: lowercase, no leading zeros, the longest run of two
 * or more zero groups (leftmost on ties) written as "::".
 */
function formatIpv6(hextets: number[]): string {
  let bestStart = -1;
  let bestLength = 0;
  let runStart = -1;

  hextets.forEach((value, index) => {
    if (value !== 0) {
      runStart = -1;
      return;
    }
    if (runStart === -1) runStart = index;
    const runLength = index - runStart + 1;
    if (runLength > bestLength) {
      bestStart = runStart;
      bestLength = runLength;
    }
  });

  const groups = hextets.map((value) => value.toString(16));
  if (bestLength < 2) return groups.join(":");

  const head = groups.slice(0, bestStart).join(":");
  const tail = groups.slice(bestStart + bestLength).join(":");
  return `${head}::${tail}`;
}

function normalizeIpv6(address: string, mask: string): CanonicalNetwork | undefined {
  const hextets = parseIpv6(address);
  const prefixText = mask.startsWith("/") ? mask.slice(1) : mask;
  const prefixLength = parsePrefixLength(prefixText, IPV6_BITS);
  if (!hextets || prefixLength === undefined) return undefined;

  const network = hextets.map((value, index) => {
    const hostBits = Math.min(16, Math.max(0, (index + 1) * 16 - prefixLength));
    return hostBits === 16 ? 0 : (value >> hostBits) << hostBits;
  });
  return { family: 6, network: formatIpv6(network), prefixLength };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Combine an address and a mask expression into its canonical network.
 * Returns undefined when either part cannot be interpreted.
 */
export function normalizeNetwork(address: string, mask: string): CanonicalNetwork | undefined {
  const addr = address.trim();
  const m = mask.trim();
  if (addr.length === 0 || m.length === 0) return undefined;

  return addr.includes(":") ? normalizeIpv6(addr, m) : normalizeIpv4(addr, m);
}

/** Text form "network/prefixLength". */
export function formatNetwork(network: CanonicalNetwork): string {
  return `${network.network}/${network.prefixLength}`;
}

export function sameNetwork(a: CanonicalNetwork, b: CanonicalNetwork): boolean {
  return a.family === b.family && a.network === b.network && a.prefixLength === b.prefixLength;
}
