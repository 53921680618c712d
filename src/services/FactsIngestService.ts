/**
 * Configuration ingestion: store a configuration text, extract the device's
 * facts from it, replace the stored facts and re-validate every link touching
 * the device.
 *
 * The whole sequence holds the device's lock, so link validation never reads
 * a half-replaced interface set. Different devices proceed in parallel.
 */

import { extractDeviceFacts } from "../shared/parsing";
import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import type { TopologyStore } from "../shared/io/TopologyStore";
import type { DeviceFacts } from "../shared/types/facts";
import type { Device, DeviceConfigSnapshot } from "../shared/types/topology";
import { KeyedLock } from "../shared/utilities/KeyedLock";

import type { LinkValidationResult, LinkValidationService } from "./LinkValidationService";

export interface IngestResult {
  snapshot: DeviceConfigSnapshot;
  facts: DeviceFacts;
  device: Device;
  links: LinkValidationResult[];
}

export interface FactsIngestServiceOptions {
  store: TopologyStore;
  validator: LinkValidationService;
  /** Per-device lock shared with other device-mutating services */
  deviceLocks?: KeyedLock;
  logger?: IOLogger;
}

export class FactsIngestService {
  private store: TopologyStore;
  private validator: LinkValidationService;
  private deviceLocks: KeyedLock;
  private logger: IOLogger;

  constructor(options: FactsIngestServiceOptions) {
    this.store = options.store;
    this.validator = options.validator;
    this.deviceLocks = options.deviceLocks ?? new KeyedLock();
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Ingest a freshly uploaded configuration text for a device.
   */
  async ingest(deviceId: string, configText: string): Promise<IngestResult> {
    return this.deviceLocks.run(deviceId, async () => {
      const snapshot = await this.store.saveConfigSnapshot(deviceId, configText);
      return this.applyConfig(deviceId, snapshot);
    });
  }

  /**
   * Re-run extraction on the latest stored configuration of a device.
   */
  async reextract(deviceId: string): Promise<IngestResult> {
    return this.deviceLocks.run(deviceId, async () => {
      const snapshot = await this.store.getLatestConfig(deviceId);
      return this.applyConfig(deviceId, snapshot);
    });
  }

  private async applyConfig(deviceId: string, snapshot: DeviceConfigSnapshot): Promise<IngestResult> {
    const facts = extractDeviceFacts(snapshot.content, { logger: this.logger });
    const device = await this.store.replaceDeviceFacts(deviceId, facts);
    this.logger.info(
      `Device ${deviceId}: ${facts.interfaces.length} interfaces, ${facts.vlans.length} VLANs ` +
        `(hostname=${facts.hostname ?? "-"}, vendor=${facts.vendor ?? "-"}, platform=${facts.platform ?? "-"})`
    );

    const links = await this.validator.validateDeviceLinks(deviceId);
    return { snapshot, facts, device, links };
  }
}
