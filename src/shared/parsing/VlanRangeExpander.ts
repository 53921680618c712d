/**
 * VLAN list expansion ("10,20,30-33" -> [10, 20, 30, 31, 32, 33]).
 * Pure functions - no I/O.
 */

import type { ParserLogger } from "./types";
import { nullLogger } from "./types";

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse a VLAN identifier token. Returns undefined for anything that is not a
 * plain non-negative integer.
 */
export function parseVlanId(token: string): number | undefined {
  const trimmed = token.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

/**
 * Expand one comma-separated sub-expression into the ids it names.
 * Returns undefined when the sub-expression is malformed.
 */
function expandPart(part: string): number[] | undefined {
  const dash = part.indexOf("-");
  if (dash === -1) {
    const single = parseVlanId(part);
    return single === undefined ? undefined : [single];
  }

  const start = parseVlanId(part.slice(0, dash));
  const end = parseVlanId(part.slice(dash + 1));
  if (start === undefined || end === undefined) return undefined;

  const ids: number[] = [];
  for (let id = start; id <= end; id++) {
    ids.push(id);
  }
  return ids;
}

/**
 * Expand a VLAN list expression into the ascending set of ids it names.
 * Malformed sub-expressions are skipped; the rest of the list still counts.
 */
export function expandVlanRange(expression: string, logger: ParserLogger = nullLogger): number[] {
  const ids = new Set<number>();

  for (const rawPart of expression.split(",")) {
    const part = rawPart.trim();
    if (part.length === 0) continue;

    const expanded = expandPart(part);
    if (!expanded) {
      logger.debug(`Skipping malformed VLAN list entry "${part}"`);
      continue;
    }
    expanded.forEach((id) => ids.add(id));
  }

  return Array.from(ids).sort((a, b) => a - b);
}

/**
 * Ids present in both lists.
 */
export function intersectVlans(a: readonly number[], b: readonly number[]): number[] {
  const other = new Set(b);
  return a.filter((id) => other.has(id));
}
