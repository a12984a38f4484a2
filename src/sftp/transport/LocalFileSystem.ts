/**
 * Local side of a transfer.
 */

import * as fs from 'fs/promises';
import { constants } from 'fs';

export interface LocalFileSystem {
  exists(path: string): Promise<boolean>;
  /** True for a regular file the process may read */
  isReadableFile(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  readFile(path: string): Promise<Buffer>;
  /** mkdir -p */
  mkdirs(path: string): Promise<void>;
  /** Remove a file; a missing file is not an error */
  remove(path: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
}

export class NodeLocalFileSystem implements LocalFileSystem {
  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async isReadableFile(path: string): Promise<boolean> {
    try {
      const stats = await fs.stat(path);
      if (!stats.isFile()) {
        return false;
      }
      await fs.access(path, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await fs.stat(path)).isDirectory();
    } catch {
      return false;
    }
  }

  async readFile(path: string): Promise<Buffer> {
    return fs.readFile(path);
  }

  async mkdirs(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  async remove(path: string): Promise<void> {
    await fs.rm(path, { force: true });
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(from, to);
  }
}
