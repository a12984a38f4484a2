/**
 * TransferEngine
 *
 * Moves single files between the local side and the server.
 *
 * Transactional mode (default) writes into a hidden, randomly named sibling of
 * the destination and renames it into place, so the destination name never
 * shows a partial file:
 *
 *   resolve conflicts -> transfer to temp -> resolve again -> rename
 *
 * The second resolution catches a destination created by someone else while
 * the bytes were moving. If anything fails once the temp file may exist, it
 * is removed before the error propagates; a failed removal is only logged.
 *
 * Non-transactional mode writes straight to the resolved destination and may
 * leave a partial file behind on failure.
 */

import * as path from 'path';
import { randomInt } from 'crypto';
import type { Readable, Writable } from 'stream';
import { ConflictResolver, LocalExistenceCheck } from './ConflictResolver.js';
import { InvalidInputError, describeError } from './errors.js';
import { joinRemote, parentOf } from './PathResolver.js';
import type { Preconditions } from './Preconditions.js';
import type { RemoteInspector } from './RemoteInspector.js';
import type { ClientConfig } from './SftpClientConfig.js';
import type { TransportSession } from './session/TransportSession.js';
import type { LocalFileSystem } from './transport/LocalFileSystem.js';
import type { LogSink } from '../logging/index.js';

const TEMP_NAME_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const TEMP_NAME_LENGTH = 25;

/**
 * Hidden random file name: '.' followed by 25 alphanumerics.
 */
export function randomTemporaryName(): string {
  let name = '.';
  for (let i = 0; i < TEMP_NAME_LENGTH; i++) {
    name += TEMP_NAME_ALPHABET.charAt(randomInt(TEMP_NAME_ALPHABET.length));
  }
  return name;
}

type UploadSource = string | Buffer | Readable;

export interface TransferEngineDeps {
  config: ClientConfig;
  session: TransportSession;
  inspector: RemoteInspector;
  preconditions: Preconditions;
  resolver: ConflictResolver;
  localFileSystem: LocalFileSystem;
  logger: LogSink;
  temporaryName?: () => string;
}

export class TransferEngine {
  private readonly config: ClientConfig;
  private readonly session: TransportSession;
  private readonly inspector: RemoteInspector;
  private readonly preconditions: Preconditions;
  private readonly resolver: ConflictResolver;
  private readonly localFileSystem: LocalFileSystem;
  private readonly localExistence: LocalExistenceCheck;
  private readonly logger: LogSink;
  private readonly temporaryName: () => string;

  constructor(deps: TransferEngineDeps) {
    this.config = deps.config;
    this.session = deps.session;
    this.inspector = deps.inspector;
    this.preconditions = deps.preconditions;
    this.resolver = deps.resolver;
    this.localFileSystem = deps.localFileSystem;
    this.localExistence = new LocalExistenceCheck(deps.localFileSystem);
    this.logger = deps.logger;
    this.temporaryName = deps.temporaryName ?? randomTemporaryName;
  }

  // ===========================================================================
  // Upload
  // ===========================================================================

  /**
   * Upload a local file. Resolves with the remote name actually written,
   * which differs from `remotePath` under the ADD_SUFFIX_* policies.
   */
  async uploadFile(remotePath: string, localPath: string): Promise<string> {
    await this.preconditions.localFile(localPath);
    if (await this.localFileSystem.isDirectory(localPath)) {
      throw new InvalidInputError(`${localPath} is not a valid local file (may be a folder?)`);
    }
    this.logger.info(`Uploading file '${localPath}' to '${remotePath}'`);
    return this.upload(remotePath, localPath);
  }

  /**
   * Upload everything a readable stream yields.
   */
  async uploadStream(remotePath: string, source: Readable): Promise<string> {
    this.logger.info(`Uploading stream to '${remotePath}'`);
    return this.upload(remotePath, source);
  }

  /**
   * Upload an in-memory buffer. Only for small payloads: the whole content
   * is held in memory.
   */
  async uploadData(remotePath: string, data: Buffer): Promise<string> {
    this.logger.info(`Uploading data to '${remotePath}'`, { bytes: data.length });
    return this.upload(remotePath, data);
  }

  /**
   * Upload local files into a remote folder, keeping their names.
   */
  async uploadFiles(remoteFolder: string, localPaths: string[]): Promise<string[]> {
    await this.preconditions.remoteFolder(remoteFolder, this.config.createDirsAutomatically);
    for (const localPath of localPaths) {
      await this.preconditions.localFile(localPath);
    }
    const written: string[] = [];
    for (const localPath of localPaths) {
      written.push(await this.uploadFile(joinRemote(remoteFolder, path.basename(localPath)), localPath));
    }
    return written;
  }

  private async upload(remotePath: string, source: UploadSource): Promise<string> {
    await this.preconditions.remoteParentFolder(remotePath, this.config.createDirsAutomatically);
    const target = await this.resolver.resolve(remotePath, this.inspector);

    if (!this.config.transactional) {
      try {
        const transport = await this.session.getConnection();
        await transport.put(source, target);
      } catch (error) {
        this.session.handleFailure(error, `Upload failed: ${target}`);
      }
      this.logger.debug('upload finished', { remotePath: target, transactional: false });
      return target;
    }

    const temporary = joinRemote(parentOf(target) ?? '', this.temporaryName());
    let temporaryMayExist = false;
    try {
      this.logger.debug(`Uploading to temporary file: ${temporary}`);
      const transport = await this.session.getConnection();
      temporaryMayExist = true;
      await transport.put(source, temporary);

      // Another process may have created the destination meanwhile
      const finalName = await this.resolver.resolve(remotePath, this.inspector);
      await (await this.session.getConnection()).rename(temporary, finalName);
      temporaryMayExist = false;
      this.logger.debug('upload finished', { remotePath: finalName, transactional: true });
      return finalName;
    } catch (error) {
      if (temporaryMayExist) {
        await this.purgeRemote(temporary);
      }
      return this.session.handleFailure(error, `Upload failed: ${remotePath}`);
    }
  }

  // ===========================================================================
  // Download
  // ===========================================================================

  /**
   * Download into a local file. Resolves with the local name actually written.
   */
  async downloadFile(remotePath: string, localPath: string): Promise<string> {
    await this.preconditions.remoteFile(remotePath);
    this.logger.info(`Downloading remote file '${remotePath}' to '${localPath}'`);
    return this.download(remotePath, localPath);
  }

  /**
   * Stream a remote file into `destination`. Always direct: there is no
   * name to rename into.
   */
  async downloadToStream(remotePath: string, destination: Writable): Promise<void> {
    await this.preconditions.remoteFile(remotePath);
    this.logger.info(`Downloading remote file '${remotePath}' to stream`);
    try {
      const transport = await this.session.getConnection();
      await transport.get(remotePath, destination);
    } catch (error) {
      this.session.handleFailure(error, `Download failed: ${remotePath}`);
    }
  }

  /**
   * Download a remote file into memory. Only for small files.
   */
  async downloadData(remotePath: string): Promise<Buffer> {
    await this.preconditions.remoteFile(remotePath);
    this.logger.info(`Downloading remote file '${remotePath}'`);
    try {
      const transport = await this.session.getConnection();
      return await transport.read(remotePath);
    } catch (error) {
      return this.session.handleFailure(error, `Download failed: ${remotePath}`);
    }
  }

  private async download(remotePath: string, localPath: string): Promise<string> {
    await this.preconditions.localParentFolder(localPath, this.config.createDirsAutomatically);
    const target = await this.resolver.resolve(localPath, this.localExistence);

    if (!this.config.transactional) {
      try {
        const transport = await this.session.getConnection();
        await transport.get(remotePath, target);
      } catch (error) {
        this.session.handleFailure(error, `Download failed: ${remotePath}`);
      }
      return target;
    }

    const temporary = path.join(path.dirname(target), this.temporaryName());
    let temporaryMayExist = false;
    try {
      const transport = await this.session.getConnection();
      temporaryMayExist = true;
      await transport.get(remotePath, temporary);

      const finalName = await this.resolver.resolve(localPath, this.localExistence);
      await this.localFileSystem.rename(temporary, finalName);
      temporaryMayExist = false;
      this.logger.debug('download finished', { localPath: finalName, transactional: true });
      return finalName;
    } catch (error) {
      if (temporaryMayExist) {
        await this.purgeLocal(temporary);
      }
      return this.session.handleFailure(error, `Download failed: ${remotePath}`);
    }
  }

  // ===========================================================================
  // Single-file remote operations
  // ===========================================================================

  /**
   * Rename or move a single remote file (full paths on both sides).
   */
  async renameRemoteFile(oldPath: string, newPath: string): Promise<void> {
    await this.preconditions.remoteFile(oldPath);
    await this.preconditions.remoteParentFolder(newPath, this.config.createDirsAutomatically);
    this.logger.debug(`Renaming '${oldPath}' to '${newPath}'`);
    try {
      const transport = await this.session.getConnection();
      await transport.rename(oldPath, newPath);
    } catch (error) {
      this.session.handleFailure(error, `Rename failed: ${oldPath} -> ${newPath}`);
    }
  }

  async deleteRemoteFile(remotePath: string): Promise<void> {
    await this.preconditions.remoteFile(remotePath);
    this.logger.debug(`Deleting remote file: ${remotePath}`);
    try {
      const transport = await this.session.getConnection();
      await transport.remove(remotePath);
    } catch (error) {
      this.session.handleFailure(error, `Delete failed: ${remotePath}`);
    }
  }

  private async purgeRemote(temporary: string): Promise<void> {
    try {
      const transport = await this.session.getConnection();
      if ((await transport.stat(temporary)) !== null) {
        await transport.remove(temporary);
      }
    } catch (error) {
      this.logger.warn(`Could not remove temporary file '${temporary}'`, { reason: describeError(error) });
    }
  }

  private async purgeLocal(temporary: string): Promise<void> {
    try {
      await this.localFileSystem.remove(temporary);
    } catch (error) {
      this.logger.warn(`Could not remove temporary file '${temporary}'`, { reason: describeError(error) });
    }
  }
}
