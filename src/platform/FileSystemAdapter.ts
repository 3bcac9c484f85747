/**
 * FileSystemAdapter - Node.js fs/promises implementation of IFileSystem
 */

import type { IFileSystem } from './IFileSystem.js';
import fs from 'fs/promises';

export class FileSystemAdapter implements IFileSystem {
  async readFile(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return fs.readFile(path, encoding);
  }

  async writeFile(
    path: string,
    content: string,
    encoding: BufferEncoding = 'utf-8'
  ): Promise<void> {
    await fs.writeFile(path, content, encoding);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(path, options);
  }
}
