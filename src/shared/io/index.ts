/**
 * Shared I/O module
 *
 * This module provides the persistence layer for projects, devices, links and
 * configuration snapshots:
 * - Project documents as YAML files (one per project)
 * - Per-file serialized read-modify-write
 *
 * Usage:
 * - Server: NodeFsAdapter for the data directory on disk
 * - Tests: an in-memory FileSystemAdapter
 */

// Types
export { noopLogger, ERROR_DOCUMENT_NOT_MAP } from "./types";
export type { FileSystemAdapter, IOLogger, SaveResult } from "./types";

// File system adapters
export { NodeFsAdapter, nodeFsAdapter } from "./NodeFsAdapter";

// Project documents
export {
  PROJECT_FILE_SUFFIX,
  parseProjectDocument,
  stringifyProjectDocument,
  writeProjectFile,
} from "./ProjectDocumentIO";
export type { ProjectWriteOptions } from "./ProjectDocumentIO";

// Store
export { TopologyStore, computeConfigHash } from "./TopologyStore";
export type { TopologyStoreOptions } from "./TopologyStore";
