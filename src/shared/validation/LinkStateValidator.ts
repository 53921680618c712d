/**
 * Link state validation from two interface snapshots.
 *
 * A link is up when its endpoints agree on at least one layer:
 * - L2: both access on the same VLAN, or both trunk with a shared allowed VLAN
 * - L3: both addressed within the same canonical network
 *
 * Access/trunk pairs get no L2 check and never count as L2 up.
 * Pure functions - safe to re-run at any time; the result depends only on the
 * two snapshots.
 */

import { intersectVlans } from "../parsing/VlanRangeExpander";
import { normalizeNetwork, sameNetwork } from "../parsing/NetworkPrefix";
import type { CanonicalNetwork } from "../parsing/NetworkPrefix";
import type { InterfaceFacts, LinkState } from "../types/facts";

/** Result of the L2 check. "skipped" when no rule applies to the mode pair. */
export type LayerResult = "up" | "down" | "skipped";

export type ValidationReason =
  | "unresolved-endpoint"
  | "l2-match"
  | "l3-match"
  | "l2-l3-match"
  | "no-match";

export interface LinkEvaluation {
  /** Final state; never "pending" once evaluated */
  state: Exclude<LinkState, "pending">;
  l2: LayerResult;
  l3: LayerResult;
  reason: ValidationReason;
}

/** The fields of an interface the validator reads. */
export type EndpointFacts = Pick<
  InterfaceFacts,
  "mode" | "accessVlan" | "trunkAllowedVlans" | "address" | "mask"
>;

// ============================================================================
// Layer checks
// ============================================================================

export function checkLayer2(source: EndpointFacts, target: EndpointFacts): LayerResult {
  if (source.mode === "access" && target.mode === "access") {
    const bothSet = source.accessVlan !== undefined && target.accessVlan !== undefined;
    return bothSet && source.accessVlan === target.accessVlan ? "up" : "down";
  }
  if (source.mode === "trunk" && target.mode === "trunk") {
    return intersectVlans(source.trunkAllowedVlans, target.trunkAllowedVlans).length > 0 ? "up" : "down";
  }
  // Mixed access/trunk: left unchecked
  return "skipped";
}

function endpointNetwork(endpoint: EndpointFacts): CanonicalNetwork | undefined {
  if (!endpoint.address || !endpoint.mask) return undefined;
  return normalizeNetwork(endpoint.address, endpoint.mask);
}

export function checkLayer3(source: EndpointFacts, target: EndpointFacts): LayerResult {
  if (!source.address || !source.mask || !target.address || !target.mask) return "skipped";

  const a = endpointNetwork(source);
  const b = endpointNetwork(target);
  if (!a || !b) return "down";
  return sameNetwork(a, b) ? "up" : "down";
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Evaluate a link from its two endpoint snapshots.
 * Pass undefined for an endpoint that could not be resolved.
 */
export function evaluateLink(
  source: EndpointFacts | undefined,
  target: EndpointFacts | undefined
): LinkEvaluation {
  if (!source || !target) {
    return { state: "down", l2: "skipped", l3: "skipped", reason: "unresolved-endpoint" };
  }

  const l2 = checkLayer2(source, target);
  const l3 = checkLayer3(source, target);

  let reason: ValidationReason = "no-match";
  if (l2 === "up" && l3 === "up") reason = "l2-l3-match";
  else if (l2 === "up") reason = "l2-match";
  else if (l3 === "up") reason = "l3-match";

  return { state: reason === "no-match" ? "down" : "up", l2, l3, reason };
}

export function validateLinkState(
  source: EndpointFacts | undefined,
  target: EndpointFacts | undefined
): Exclude<LinkState, "pending"> {
  return evaluateLink(source, target).state;
}
