/**
 * Shared I/O types for the topology store
 */

/**
 * Logger interface for I/O operations
 */
export interface IOLogger {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

/**
 * No-op logger for when logging is not needed
 */
export const noopLogger: IOLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * FileSystemAdapter - Abstraction for file system operations
 *
 * This allows the same store logic to work against:
 * - the data directory on disk (Node.js fs.promises)
 * - in-memory storage for test isolation
 */
export interface FileSystemAdapter {
  /**
   * Read file as UTF-8 string.
   * @throws Error if file doesn't exist
   */
  readFile(filePath: string): Promise<string>;

  /**
   * Write content to file (UTF-8).
   * Creates parent directories if needed.
   */
  writeFile(filePath: string, content: string): Promise<void>;

  /**
   * Delete file.
   * Should not throw if file doesn't exist.
   */
  unlink(filePath: string): Promise<void>;

  /**
   * Check if file exists
   */
  exists(filePath: string): Promise<boolean>;

  /**
   * List entry names in a directory; empty when the directory doesn't exist
   */
  readdir(dirPath: string): Promise<string[]>;

  /**
   * Join path segments
   */
  join(...segments: string[]): string;
}

/** Common error messages */
export const ERROR_DOCUMENT_NOT_MAP = "Project document is not a YAML map";

/**
 * Result of a write operation
 */
export interface SaveResult {
  /** False when the file already held identical content */
  written: boolean;
}
