/**
 * Banner and model substrings recognized while guessing a device's vendor and
 * platform from the head of its configuration text.
 */

/** How many raw lines are scanned for vendor/platform signals. */
export const SIGNATURE_SCAN_LINES = 100;

/** Comment markers that may introduce a "key: value" metadata line. */
export const COMMENT_MARKERS = ["!", "#"] as const;

export interface SignatureRule {
  /** Literal substring looked for in a raw line */
  match: string;
  field: "vendor" | "platform";
  value: string;
}

/**
 * Ordered table. Several rules may fire on one line; later rules win for the
 * same field, and so do later lines.
 */
export const PLATFORM_SIGNATURES: readonly SignatureRule[] = [
  { match: "Cisco IOS Software", field: "vendor", value: "cisco" },
  { match: "Cisco IOS XE Software", field: "vendor", value: "cisco" },
  { match: "Cisco Nexus Operating System", field: "vendor", value: "cisco" },
  { match: "Arista Networks EOS", field: "vendor", value: "arista" },
  { match: "JUNOS", field: "vendor", value: "juniper" },
  { match: "C9300", field: "platform", value: "Catalyst 9300" },
  { match: "C9200", field: "platform", value: "Catalyst 9200" },
  { match: "C3850", field: "platform", value: "Catalyst 3850" },
  { match: "CSR1000V", field: "platform", value: "CSR 1000v" },
  { match: "C8000V", field: "platform", value: "Catalyst 8000V" },
  { match: "ISR4331", field: "platform", value: "ISR 4331" },
  { match: "N9K", field: "platform", value: "Nexus 9000" },
  { match: "vEOS", field: "platform", value: "Arista vEOS" }
];
