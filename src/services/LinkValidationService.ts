/**
 * Link validation against stored interface facts.
 *
 * Resolves both endpoints of a link through the store, evaluates the pair and
 * stores the resulting state. Every call recomputes from current data.
 */

import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import type { TopologyStore } from "../shared/io/TopologyStore";
import type { Link } from "../shared/types/topology";
import { evaluateLink } from "../shared/validation";
import type { LinkEvaluation } from "../shared/validation";

export interface LinkValidationResult {
  link: Link;
  evaluation: LinkEvaluation;
}

export interface LinkValidationServiceOptions {
  store: TopologyStore;
  logger?: IOLogger;
}

export class LinkValidationService {
  private store: TopologyStore;
  private logger: IOLogger;

  constructor(options: LinkValidationServiceOptions) {
    this.store = options.store;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Recompute and store the state of one link.
   */
  async validate(linkId: string): Promise<LinkValidationResult> {
    const link = await this.store.getLink(linkId);
    const [source, target] = await Promise.all([
      this.store.resolveInterface(link.sourceDeviceId, link.sourceInterface),
      this.store.resolveInterface(link.targetDeviceId, link.targetInterface)
    ]);

    const evaluation = evaluateLink(source, target);
    const updated = await this.store.setLinkState(linkId, evaluation.state);
    this.logger.debug(
      `Link ${linkId} ${link.sourceInterface} <-> ${link.targetInterface}: ${evaluation.state} ` +
        `(l2=${evaluation.l2}, l3=${evaluation.l3}, ${evaluation.reason})`
    );
    return { link: updated, evaluation };
  }

  /**
   * Recompute every link whose source or target is the device.
   * Links are validated one after another in store order.
   */
  async validateDeviceLinks(deviceId: string): Promise<LinkValidationResult[]> {
    const linkIds = await this.store.linksTouchingDevice(deviceId);
    const results: LinkValidationResult[] = [];
    for (const linkId of linkIds) {
      results.push(await this.validate(linkId));
    }
    this.logger.info(`Validated ${results.length} links touching device ${deviceId}`);
    return results;
  }
}
