/**
 * DirectoryEngine
 *
 * Folder-level operations: listing with wildcards, recursive create and
 * delete, and bulk delete/move/download of the files in one folder.
 */

import * as path from 'path';
import { MATCH_ALL, joinRemote, matchesWildcard, parentOf, stripTrailingSeparators, validateWildcard } from './PathResolver.js';
import type { Preconditions } from './Preconditions.js';
import { RemoteFile, RemoteFileType } from './RemoteFile.js';
import type { RemoteInspector } from './RemoteInspector.js';
import type { ClientConfig } from './SftpClientConfig.js';
import type { TransportSession } from './session/TransportSession.js';
import type { TransferEngine } from './TransferEngine.js';
import type { RemoteEntry } from './transport/SftpTransport.js';
import type { LogSink } from '../logging/index.js';

const SELF_OR_PARENT = new Set(['.', '..']);

export interface DirectoryEngineDeps {
  config: ClientConfig;
  session: TransportSession;
  inspector: RemoteInspector;
  preconditions: Preconditions;
  transfers: TransferEngine;
  logger: LogSink;
}

export class DirectoryEngine {
  private readonly config: ClientConfig;
  private readonly session: TransportSession;
  private readonly inspector: RemoteInspector;
  private readonly preconditions: Preconditions;
  private readonly transfers: TransferEngine;
  private readonly logger: LogSink;

  constructor(deps: DirectoryEngineDeps) {
    this.config = deps.config;
    this.session = deps.session;
    this.inspector = deps.inspector;
    this.preconditions = deps.preconditions;
    this.transfers = deps.transfers;
    this.logger = deps.logger;
  }

  /**
   * Entries of `folder` whose name matches `wildcard`, without '.' and '..'.
   * One entry per name; order is not significant.
   */
  async listFiles(folder: string, wildcard: string = MATCH_ALL): Promise<RemoteFile[]> {
    const pattern = validateWildcard(wildcard);
    await this.preconditions.remoteFolder(folder);

    let entries: RemoteEntry[];
    try {
      const transport = await this.session.getConnection();
      entries = await transport.list(folder);
    } catch (error) {
      return this.session.handleFailure(error, `Listing failed: ${folder}`);
    }

    const byName = new Map<string, RemoteFile>();
    for (const entry of entries) {
      if (SELF_OR_PARENT.has(entry.name) || byName.has(entry.name)) {
        continue;
      }
      if (matchesWildcard(entry.name, pattern)) {
        byName.set(entry.name, new RemoteFile(this.config.host, folder, entry.name, entry.size, entry.type));
      }
    }
    return Array.from(byName.values());
  }

  async statRemoteFile(remotePath: string): Promise<RemoteFile | null> {
    return this.inspector.stat(remotePath);
  }

  /**
   * Create `folder` and every missing ancestor, shallowest first. A failure
   * part way leaves the ancestors created so far in place.
   */
  async createFolder(folder: string): Promise<void> {
    const missing: string[] = [];
    let current: string | null = stripTrailingSeparators(folder);
    while (current !== null && current !== '' && !(await this.inspector.exists(current))) {
      missing.push(current);
      current = parentOf(current);
    }
    if (missing.length === 0) {
      return;
    }

    this.logger.debug(`Creating remote folder: ${folder}`, { missing: missing.length });
    try {
      const transport = await this.session.getConnection();
      for (const dir of missing.reverse()) {
        await transport.mkdir(dir);
      }
    } catch (error) {
      this.session.handleFailure(error, `Create folder failed: ${folder}`);
    }
  }

  /**
   * Delete `folder` with everything below it. Irreversible.
   */
  async deleteFolder(folder: string): Promise<void> {
    await this.preconditions.remoteFolder(folder);
    this.logger.info(`Deleting remote folder: ${folder}`);
    await this.deleteTree(folder);
  }

  private async deleteTree(folder: string): Promise<void> {
    let entries: RemoteEntry[];
    try {
      const transport = await this.session.getConnection();
      entries = await transport.list(folder);
    } catch (error) {
      return this.session.handleFailure(error, `Delete folder failed: ${folder}`);
    }

    for (const entry of entries) {
      if (SELF_OR_PARENT.has(entry.name)) {
        continue;
      }
      const child = joinRemote(folder, entry.name);
      if (entry.type === RemoteFileType.FOLDER) {
        await this.deleteTree(child);
        continue;
      }
      try {
        await (await this.session.getConnection()).remove(child);
      } catch (error) {
        this.session.handleFailure(error, `Delete failed: ${child}`);
      }
    }

    try {
      await (await this.session.getConnection()).rmdir(folder);
    } catch (error) {
      this.session.handleFailure(error, `Delete folder failed: ${folder}`);
    }
  }

  /**
   * Delete the files of `folder` that match `wildcard`; folders are left
   * alone. Resolves with the number of files deleted.
   */
  async deleteFiles(folder: string, wildcard: string = MATCH_ALL): Promise<number> {
    const files = (await this.listFiles(folder, wildcard)).filter((file) => file.isFile());
    for (const file of files) {
      await this.transfers.deleteRemoteFile(file.fullName);
    }
    this.logger.debug(`Deleted ${files.length} file(s) in ${folder}`, { wildcard });
    return files.length;
  }

  /**
   * Move the matching files of `sourceFolder` into `targetFolder`, keeping
   * their names. Resolves with the number of files moved.
   */
  async moveFiles(sourceFolder: string, targetFolder: string, wildcard: string = MATCH_ALL): Promise<number> {
    const files = (await this.listFiles(sourceFolder, wildcard)).filter((file) => file.isFile());
    await this.preconditions.remoteFolder(targetFolder, this.config.createDirsAutomatically);
    for (const file of files) {
      await this.transfers.renameRemoteFile(file.fullName, joinRemote(targetFolder, file.name));
    }
    this.logger.debug(`Moved ${files.length} file(s) from ${sourceFolder} to ${targetFolder}`, { wildcard });
    return files.length;
  }

  /**
   * Download the matching files of `remoteFolder` (not recursive) into
   * `localFolder`. Resolves with the local names written.
   */
  async downloadFiles(remoteFolder: string, localFolder: string, wildcard: string = MATCH_ALL): Promise<string[]> {
    const files = (await this.listFiles(remoteFolder, wildcard)).filter((file) => file.isFile());
    await this.preconditions.localFolder(localFolder, this.config.createDirsAutomatically);
    const written: string[] = [];
    for (const file of files) {
      written.push(await this.transfers.downloadFile(file.fullName, path.join(localFolder, file.name)));
    }
    this.logger.debug(`Downloaded ${written.length} file(s) from ${remoteFolder}`, { wildcard });
    return written;
  }
}
