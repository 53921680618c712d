/**
 * Topology mutations that affect link state.
 *
 * - a new link is validated once, right after creation
 * - an updated link is re-validated
 * - deleting a device re-validates the links that referenced it
 * - deleting a project re-validates links in other projects that referenced
 *   its devices
 */

import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import type { TopologyStore } from "../shared/io/TopologyStore";
import type { LinkInput, LinkUpdate } from "../shared/types/topology";
import { KeyedLock } from "../shared/utilities/KeyedLock";

import type { LinkValidationResult, LinkValidationService } from "./LinkValidationService";

export interface TopologyServiceOptions {
  store: TopologyStore;
  validator: LinkValidationService;
  deviceLocks?: KeyedLock;
  logger?: IOLogger;
}

export class TopologyService {
  private store: TopologyStore;
  private validator: LinkValidationService;
  private deviceLocks: KeyedLock;
  private logger: IOLogger;

  constructor(options: TopologyServiceOptions) {
    this.store = options.store;
    this.validator = options.validator;
    this.deviceLocks = options.deviceLocks ?? new KeyedLock();
    this.logger = options.logger ?? noopLogger;
  }

  async createLink(projectId: string, input: LinkInput): Promise<LinkValidationResult> {
    const link = await this.store.createLink(projectId, input);
    this.logger.info(`Created link ${link.id} in project ${projectId}`);
    return this.validator.validate(link.id);
  }

  async updateLink(linkId: string, update: LinkUpdate): Promise<LinkValidationResult> {
    await this.store.updateLink(linkId, update);
    return this.validator.validate(linkId);
  }

  /**
   * Delete a device, then re-validate the links that pointed at it.
   * Those links no longer resolve and end up down.
   */
  async deleteDevice(deviceId: string): Promise<LinkValidationResult[]> {
    return this.deviceLocks.run(deviceId, async () => {
      const linkIds = await this.store.linksTouchingDevice(deviceId);
      await this.store.deleteDevice(deviceId);

      const results: LinkValidationResult[] = [];
      for (const linkId of linkIds) {
        results.push(await this.validator.validate(linkId));
      }
      return results;
    });
  }

  /**
   * Delete a project with its devices and links, then re-validate the links
   * in other projects that pointed at those devices. Every device of the
   * project stays locked until the re-validation is done.
   */
  async deleteProject(projectId: string): Promise<LinkValidationResult[]> {
    const deviceIds = (await this.store.listDevices(projectId)).map((device) => device.id).sort();

    return this.withDeviceLocks(deviceIds, async () => {
      const ownLinks = new Set((await this.store.listLinks(projectId)).map((link) => link.id));
      const survivors = new Set<string>();
      for (const deviceId of deviceIds) {
        for (const linkId of await this.store.linksTouchingDevice(deviceId)) {
          if (!ownLinks.has(linkId)) survivors.add(linkId);
        }
      }

      await this.store.deleteProject(projectId);

      const results: LinkValidationResult[] = [];
      for (const linkId of survivors) {
        results.push(await this.validator.validate(linkId));
      }
      this.logger.info(`Deleted project ${projectId}; re-validated ${results.length} links`);
      return results;
    });
  }

  // Keys are taken in sorted order so two multi-device callers cannot deadlock.
  private async withDeviceLocks<T>(deviceIds: readonly string[], operation: () => Promise<T>): Promise<T> {
    const [first, ...rest] = deviceIds;
    if (first === undefined) return operation();
    return this.deviceLocks.run(first, () => this.withDeviceLocks(rest, operation));
  }
}
