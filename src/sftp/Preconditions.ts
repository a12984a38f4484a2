/**
 * Existence preconditions of the transfer and directory operations.
 *
 * In strict mode missing sources and destination folders fail with
 * NotFoundError. Auto-creation of folders works independently of strict mode.
 */

import * as path from 'path';
import { NotFoundError } from './errors.js';
import { parentOf } from './PathResolver.js';
import type { RemoteInspector } from './RemoteInspector.js';
import type { ClientConfig } from './SftpClientConfig.js';
import type { LocalFileSystem } from './transport/LocalFileSystem.js';

export type RemoteFolderCreator = (folder: string) => Promise<void>;

export class Preconditions {
  constructor(
    private readonly config: ClientConfig,
    private readonly inspector: RemoteInspector,
    private readonly localFileSystem: LocalFileSystem,
    private readonly createRemoteFolder: RemoteFolderCreator
  ) {}

  async remoteFile(remotePath: string): Promise<void> {
    if (!this.config.strictMode) {
      return;
    }
    const file = await this.inspector.stat(remotePath);
    if (file === null || !file.isFile()) {
      throw new NotFoundError(`Remote file not found or not a valid file: ${remotePath}`, remotePath);
    }
  }

  /**
   * @param create create the folder (and its ancestors) if it is missing
   */
  async remoteFolder(folder: string, create = false): Promise<void> {
    if (!create && !this.config.strictMode) {
      return;
    }
    const existing = await this.inspector.stat(folder);
    if (existing === null) {
      if (create) {
        await this.createRemoteFolder(folder);
        return;
      }
      throw new NotFoundError(`Remote folder not found: ${folder}`, folder);
    }
    if (this.config.strictMode && !existing.isFolder()) {
      throw new NotFoundError(`Remote folder not found or not a valid folder: ${folder}`, folder);
    }
  }

  /**
   * Folder of `remotePath` must exist (or is created). Root-relative names
   * have no folder to check.
   */
  async remoteParentFolder(remotePath: string, create = false): Promise<void> {
    const parent = parentOf(remotePath);
    if (parent !== null) {
      await this.remoteFolder(parent, create);
    }
  }

  async localFile(localPath: string): Promise<void> {
    if (this.config.strictMode && !(await this.localFileSystem.isReadableFile(localPath))) {
      throw new NotFoundError(`Cannot read local file: ${localPath}`, localPath);
    }
  }

  async localFolder(folder: string, create = false): Promise<void> {
    if (!create && !this.config.strictMode) {
      return;
    }
    if (await this.localFileSystem.isDirectory(folder)) {
      return;
    }
    if (create) {
      await this.localFileSystem.mkdirs(folder);
      return;
    }
    throw new NotFoundError(`Local folder not found: ${folder}`, folder);
  }

  async localParentFolder(localPath: string, create = false): Promise<void> {
    await this.localFolder(path.dirname(localPath), create);
  }
}
