/**
 * NodeFsAdapter - Node.js file system adapter
 *
 * Implements FileSystemAdapter using Node.js fs.promises.
 * Used by the server for the data directory on disk.
 */

import * as fs from "fs";
import * as path from "path";

import type { FileSystemAdapter } from "./types";

function hasCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

/**
 * File system adapter using Node.js fs.promises
 */
export class NodeFsAdapter implements FileSystemAdapter {
  async readFile(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, "utf8");
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, content, "utf8");
  }

  async unlink(filePath: string): Promise<void> {
    try {
      await fs.promises.unlink(filePath);
    } catch (err) {
      // Ignore ENOENT (file doesn't exist)
      if (!hasCode(err, "ENOENT")) {
        throw err;
      }
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readdir(dirPath: string): Promise<string[]> {
    try {
      return await fs.promises.readdir(dirPath);
    } catch (err) {
      if (hasCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  join(...segments: string[]): string {
    return path.join(...segments);
  }
}

/** Singleton instance for convenience */
export const nodeFsAdapter = new NodeFsAdapter();
