/**
 * MemoryFsAdapter - in-memory FileSystemAdapter for unit tests
 *
 * Files live in a Map keyed by POSIX path; directories exist implicitly.
 */

import * as path from 'path';
import type { FileSystemAdapter } from '../../src/shared/io/types';

export class MemoryFsAdapter implements FileSystemAdapter {
  readonly files: Map<string, string>;
  writes = 0;

  constructor(initial: Record<string, string> = {}) {
    this.files = new Map(Object.entries(initial));
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file ${filePath}`);
    }
    return content;
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.writes++;
    this.files.set(filePath, content);
  }

  async unlink(filePath: string): Promise<void> {
    this.files.delete(filePath);
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async readdir(dirPath: string): Promise<string[]> {
    const names: string[] = [];
    for (const filePath of this.files.keys()) {
      if (path.posix.dirname(filePath) === dirPath) {
        names.push(path.posix.basename(filePath));
      }
    }
    return names;
  }

  join(...segments: string[]): string {
    return path.posix.join(...segments);
  }
}
