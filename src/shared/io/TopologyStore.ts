/**
 * TopologyStore - persistence for projects, devices, links and configuration
 * snapshots.
 *
 * Each project lives in its own YAML document under `<dataDir>/projects/`.
 * Every read-modify-write of a document is serialized per file, so concurrent
 * requests never interleave on the same project. Device and link ids are
 * mapped to their project through an index built on first use.
 */

import { createHash, randomUUID } from "crypto";

import { NotFoundError } from "../errors";
import type { DeviceFacts, InterfaceFacts, LinkState } from "../types/facts";
import type {
  Device,
  DeviceConfigSnapshot,
  DeviceInput,
  Link,
  LinkInput,
  LinkUpdate,
  Project,
  ProjectDocument,
  ProjectInput
} from "../types/topology";
import { DEFAULT_DEVICE_PLATFORM, DEFAULT_DEVICE_VENDOR, DEFAULT_LINK_MEDIUM } from "../types/topology";
import { KeyedLock } from "../utilities/KeyedLock";

import { PROJECT_FILE_SUFFIX, parseProjectDocument, writeProjectFile } from "./ProjectDocumentIO";
import type { FileSystemAdapter, IOLogger } from "./types";
import { noopLogger } from "./types";

/** Ids end up in file names; anything else can never name a stored record. */
const SAFE_ID = /^[A-Za-z0-9_-]+$/;

/**
 * Options for creating a TopologyStore
 */
export interface TopologyStoreOptions {
  fs: FileSystemAdapter;
  dataDir: string;
  logger?: IOLogger;
  /** Clock, replaceable in tests */
  now?: () => Date;
  /** Id generator, replaceable in tests */
  generateId?: () => string;
}

/** MD5 hex digest used to tell configuration uploads apart. */
export function computeConfigHash(content: string): string {
  return createHash("md5").update(content, "utf8").digest("hex");
}

function cloneInterface(iface: InterfaceFacts): InterfaceFacts {
  return { ...iface, trunkAllowedVlans: [...iface.trunkAllowedVlans] };
}

export class TopologyStore {
  private fs: FileSystemAdapter;
  private dataDir: string;
  private logger: IOLogger;
  private now: () => Date;
  private generateId: () => string;
  private fileLocks = new KeyedLock();
  private deviceIndex: Map<string, string> = new Map();
  private linkIndex: Map<string, string> = new Map();
  private indexReady: Promise<void> | undefined;

  constructor(options: TopologyStoreOptions) {
    this.fs = options.fs;
    this.dataDir = options.dataDir;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  // ---------------------------------------------------------------------------
  // Document access
  // ---------------------------------------------------------------------------

  getProjectsDir(): string {
    return this.fs.join(this.dataDir, "projects");
  }

  getProjectFilePath(projectId: string): string {
    return this.fs.join(this.getProjectsDir(), `${projectId}${PROJECT_FILE_SUFFIX}`);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private async listProjectIds(): Promise<string[]> {
    const entries = await this.fs.readdir(this.getProjectsDir());
    return entries
      .filter((entry) => entry.endsWith(PROJECT_FILE_SUFFIX))
      .map((entry) => entry.slice(0, -PROJECT_FILE_SUFFIX.length))
      .sort();
  }

  private async loadDocument(projectId: string): Promise<ProjectDocument> {
    const filePath = this.getProjectFilePath(projectId);
    if (!SAFE_ID.test(projectId) || !(await this.fs.exists(filePath))) {
      throw new NotFoundError("Project", projectId);
    }
    return parseProjectDocument(await this.fs.readFile(filePath));
  }

  /**
   * Read a project document under its file lock.
   */
  private async readProject<T>(projectId: string, reader: (doc: ProjectDocument) => T): Promise<T> {
    return this.fileLocks.run(projectId, async () => reader(await this.loadDocument(projectId)));
  }

  /**
   * Serialized read-modify-write of one project document. The modifier
   * mutates the document in place; its return value is passed through.
   */
  private async modifyProject<T>(projectId: string, modifier: (doc: ProjectDocument) => T): Promise<T> {
    return this.fileLocks.run(projectId, async () => {
      const doc = await this.loadDocument(projectId);
      const result = modifier(doc);
      await writeProjectFile(doc, this.getProjectFilePath(projectId), { fs: this.fs, logger: this.logger });
      return result;
    });
  }

  /**
   * Build the device/link to project index once, from every project file.
   */
  private async ensureIndex(): Promise<void> {
    if (!this.indexReady) {
      this.indexReady = this.buildIndex().catch((err: unknown) => {
        this.indexReady = undefined;
        throw err;
      });
    }
    return this.indexReady;
  }

  private async buildIndex(): Promise<void> {
    for (const projectId of await this.listProjectIds()) {
      const doc = await this.readProject(projectId, (d) => d);
      this.indexDocument(doc);
    }
    this.logger.debug(`Indexed ${this.deviceIndex.size} devices and ${this.linkIndex.size} links`);
  }

  private indexDocument(doc: ProjectDocument): void {
    doc.devices.forEach((device) => this.deviceIndex.set(device.id, doc.project.id));
    doc.links.forEach((link) => this.linkIndex.set(link.id, doc.project.id));
  }

  private async projectOfDevice(deviceId: string): Promise<string> {
    await this.ensureIndex();
    const projectId = this.deviceIndex.get(deviceId);
    if (projectId === undefined) throw new NotFoundError("Device", deviceId);
    return projectId;
  }

  private async projectOfLink(linkId: string): Promise<string> {
    await this.ensureIndex();
    const projectId = this.linkIndex.get(linkId);
    if (projectId === undefined) throw new NotFoundError("Link", linkId);
    return projectId;
  }

  private static findDevice(doc: ProjectDocument, deviceId: string): Device {
    const device = doc.devices.find((d) => d.id === deviceId);
    if (!device) throw new NotFoundError("Device", deviceId);
    return device;
  }

  private static findLink(doc: ProjectDocument, linkId: string): Link {
    const link = doc.links.find((l) => l.id === linkId);
    if (!link) throw new NotFoundError("Link", linkId);
    return link;
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  async createProject(input: ProjectInput): Promise<Project> {
    await this.ensureIndex();
    const createdAt = this.timestamp();
    const project: Project = {
      id: this.generateId(),
      name: input.name,
      createdAt,
      updatedAt: createdAt
    };
    if (input.description !== undefined) project.description = input.description;

    const doc: ProjectDocument = { project, devices: [], links: [], configs: [] };
    await this.fileLocks.run(project.id, () =>
      writeProjectFile(doc, this.getProjectFilePath(project.id), { fs: this.fs, logger: this.logger })
    );
    this.logger.info(`Created project ${project.id} (${project.name})`);
    return project;
  }

  async listProjects(): Promise<Project[]> {
    const projects: Project[] = [];
    for (const projectId of await this.listProjectIds()) {
      projects.push(await this.readProject(projectId, (doc) => doc.project));
    }
    return projects;
  }

  async getProject(projectId: string): Promise<Project> {
    return this.readProject(projectId, (doc) => doc.project);
  }

  async deleteProject(projectId: string): Promise<void> {
    await this.ensureIndex();
    await this.fileLocks.run(projectId, async () => {
      const doc = await this.loadDocument(projectId);
      await this.fs.unlink(this.getProjectFilePath(projectId));
      doc.devices.forEach((device) => this.deviceIndex.delete(device.id));
      doc.links.forEach((link) => this.linkIndex.delete(link.id));
    });
    this.logger.info(`Deleted project ${projectId}`);
  }

  // ---------------------------------------------------------------------------
  // Devices
  // ---------------------------------------------------------------------------

  async createDevice(projectId: string, input: DeviceInput): Promise<Device> {
    await this.ensureIndex();
    const createdAt = this.timestamp();
    const device: Device = {
      id: this.generateId(),
      projectId,
      hostname: input.hostname,
      role: input.role,
      vendor: input.vendor ?? DEFAULT_DEVICE_VENDOR,
      platform: input.platform ?? DEFAULT_DEVICE_PLATFORM,
      canvasX: input.canvasX ?? 0,
      canvasY: input.canvasY ?? 0,
      createdAt,
      updatedAt: createdAt,
      interfaces: [],
      vlans: []
    };
    if (input.managementAddress !== undefined) device.managementAddress = input.managementAddress;

    await this.modifyProject(projectId, (doc) => {
      doc.devices.push(device);
    });
    this.deviceIndex.set(device.id, projectId);
    return device;
  }

  async listDevices(projectId: string): Promise<Device[]> {
    return this.readProject(projectId, (doc) => doc.devices);
  }

  async getDevice(deviceId: string): Promise<Device> {
    const projectId = await this.projectOfDevice(deviceId);
    return this.readProject(projectId, (doc) => TopologyStore.findDevice(doc, deviceId));
  }

  /**
   * Delete a device with its configuration snapshots. Links that reference it
   * are kept; their endpoint no longer resolves.
   */
  async deleteDevice(deviceId: string): Promise<void> {
    const projectId = await this.projectOfDevice(deviceId);
    await this.modifyProject(projectId, (doc) => {
      TopologyStore.findDevice(doc, deviceId);
      doc.devices = doc.devices.filter((d) => d.id !== deviceId);
      doc.configs = doc.configs.filter((c) => c.deviceId !== deviceId);
    });
    this.deviceIndex.delete(deviceId);
    this.logger.info(`Deleted device ${deviceId}`);
  }

  // ---------------------------------------------------------------------------
  // Configuration snapshots and facts
  // ---------------------------------------------------------------------------

  /**
   * Store a configuration text and record its hash on the device.
   */
  async saveConfigSnapshot(deviceId: string, content: string): Promise<DeviceConfigSnapshot> {
    const projectId = await this.projectOfDevice(deviceId);
    const snapshot: DeviceConfigSnapshot = {
      id: this.generateId(),
      deviceId,
      content,
      createdAt: this.timestamp()
    };

    await this.modifyProject(projectId, (doc) => {
      const device = TopologyStore.findDevice(doc, deviceId);
      device.configHash = computeConfigHash(content);
      device.updatedAt = snapshot.createdAt;
      doc.configs.push(snapshot);
    });
    return snapshot;
  }

  /**
   * Most recent configuration snapshot of a device. Snapshots are appended in
   * upload order, so the last one for the device wins on equal timestamps.
   */
  async getLatestConfig(deviceId: string): Promise<DeviceConfigSnapshot> {
    const projectId = await this.projectOfDevice(deviceId);
    const latest = await this.readProject(projectId, (doc) => {
      const snapshots = doc.configs.filter((c) => c.deviceId === deviceId);
      return snapshots[snapshots.length - 1];
    });
    if (!latest) throw new NotFoundError("Configuration for device", deviceId);
    return latest;
  }

  /**
   * Replace a device's interfaces and VLANs with freshly extracted facts and
   * update its identity fields. Hostname, vendor and platform keep their
   * stored value when the facts leave them unset; the management address is
   * always taken from the facts.
   */
  async replaceDeviceFacts(deviceId: string, facts: DeviceFacts): Promise<Device> {
    const projectId = await this.projectOfDevice(deviceId);
    return this.modifyProject(projectId, (doc) => {
      const device = TopologyStore.findDevice(doc, deviceId);
      device.interfaces = facts.interfaces.map(cloneInterface);
      device.vlans = facts.vlans.map((vlan) => ({ ...vlan }));
      if (facts.hostname !== undefined) device.hostname = facts.hostname;
      if (facts.vendor !== undefined) device.vendor = facts.vendor;
      if (facts.platform !== undefined) device.platform = facts.platform;
      if (facts.managementAddress !== undefined) {
        device.managementAddress = facts.managementAddress;
      } else {
        delete device.managementAddress;
      }
      device.updatedAt = this.timestamp();
      return device;
    });
  }

  /**
   * Look up one interface. Undefined when the device or the interface is
   * unknown.
   */
  async resolveInterface(deviceId: string, interfaceName: string): Promise<InterfaceFacts | undefined> {
    await this.ensureIndex();
    const projectId = this.deviceIndex.get(deviceId);
    if (projectId === undefined) return undefined;

    return this.readProject(projectId, (doc) => {
      const device = doc.devices.find((d) => d.id === deviceId);
      return device?.interfaces.find((iface) => iface.name === interfaceName);
    });
  }

  // ---------------------------------------------------------------------------
  // Links
  // ---------------------------------------------------------------------------

  async createLink(projectId: string, input: LinkInput): Promise<Link> {
    await this.ensureIndex();
    const link: Link = {
      id: this.generateId(),
      projectId,
      sourceDeviceId: input.sourceDeviceId,
      sourceInterface: input.sourceInterface,
      targetDeviceId: input.targetDeviceId,
      targetInterface: input.targetInterface,
      medium: input.medium ?? DEFAULT_LINK_MEDIUM,
      vlanAllowList: [...(input.vlanAllowList ?? [])],
      state: "pending"
    };

    await this.modifyProject(projectId, (doc) => {
      doc.links.push(link);
    });
    this.linkIndex.set(link.id, projectId);
    return link;
  }

  async listLinks(projectId: string): Promise<Link[]> {
    return this.readProject(projectId, (doc) => doc.links);
  }

  async getLink(linkId: string): Promise<Link> {
    const projectId = await this.projectOfLink(linkId);
    return this.readProject(projectId, (doc) => TopologyStore.findLink(doc, linkId));
  }

  /**
   * Change a link's own configuration. The state is left for the caller to
   * recompute.
   */
  async updateLink(linkId: string, update: LinkUpdate): Promise<Link> {
    const projectId = await this.projectOfLink(linkId);
    return this.modifyProject(projectId, (doc) => {
      const link = TopologyStore.findLink(doc, linkId);
      if (update.sourceDeviceId !== undefined) link.sourceDeviceId = update.sourceDeviceId;
      if (update.sourceInterface !== undefined) link.sourceInterface = update.sourceInterface;
      if (update.targetDeviceId !== undefined) link.targetDeviceId = update.targetDeviceId;
      if (update.targetInterface !== undefined) link.targetInterface = update.targetInterface;
      if (update.medium !== undefined) link.medium = update.medium;
      if (update.vlanAllowList !== undefined) link.vlanAllowList = [...update.vlanAllowList];
      return link;
    });
  }

  async deleteLink(linkId: string): Promise<void> {
    const projectId = await this.projectOfLink(linkId);
    await this.modifyProject(projectId, (doc) => {
      TopologyStore.findLink(doc, linkId);
      doc.links = doc.links.filter((l) => l.id !== linkId);
    });
    this.linkIndex.delete(linkId);
    this.logger.info(`Deleted link ${linkId}`);
  }

  async setLinkState(linkId: string, state: LinkState): Promise<Link> {
    const projectId = await this.projectOfLink(linkId);
    return this.modifyProject(projectId, (doc) => {
      const link = TopologyStore.findLink(doc, linkId);
      link.state = state;
      return link;
    });
  }

  /**
   * Ids of every link whose source or target is the device, across projects.
   */
  async linksTouchingDevice(deviceId: string): Promise<string[]> {
    await this.ensureIndex();
    const projectIds = new Set(this.linkIndex.values());
    const linkIds: string[] = [];

    for (const projectId of Array.from(projectIds).sort()) {
      const touching = await this.readProject(projectId, (doc) =>
        doc.links
          .filter((link) => link.sourceDeviceId === deviceId || link.targetDeviceId === deviceId)
          .map((link) => link.id)
      );
      linkIds.push(...touching);
    }
    return linkIds;
  }
}
