/**
 * SftpClient
 *
 * Public entry point. One client owns one TransportSession, created lazily on
 * the first operation and reused until disconnect() or until it goes stale.
 *
 * @example
 * const client = new SftpClient({ host: 'sftp.example.com', user: 'deploy', password: 'test-secret' })
 *   .withOverwritePolicy(OverwritePolicy.ADD_SUFFIX_BEFORE_EXTENSION)
 *   .withKeepAlive(10_000);
 * await client.uploadFile('/inbox/report.csv', './report.csv');
 * await client.disconnect();
 */

import type { Readable, Writable } from 'stream';
import { ConflictResolver, OverwritePolicy } from './ConflictResolver.js';
import { DirectoryEngine } from './DirectoryEngine.js';
import { StateError } from './errors.js';
import { Preconditions } from './Preconditions.js';
import type { RemoteFile } from './RemoteFile.js';
import { RemoteInspector } from './RemoteInspector.js';
import { resolveClientConfig, validateKeepAliveInterval, validateTimeout } from './SftpClientConfig.js';
import type { ClientConfig, SftpClientOptions } from './SftpClientConfig.js';
import type { HostKeyType } from './session/HostIdentityVerifier.js';
import { TransportSession } from './session/TransportSession.js';
import { TransferEngine } from './TransferEngine.js';
import { NodeLocalFileSystem } from './transport/LocalFileSystem.js';
import { Ssh2SftpTransport } from './transport/Ssh2SftpTransport.js';
import { getLogger } from '../logging/index.js';
import type { LogSink } from '../logging/index.js';

const ACTIVE_CONNECTION_MESSAGE = 'There is already an active sftp connection.';

export class SftpClient {
  private readonly config: ClientConfig;
  private readonly session: TransportSession;
  private readonly transfers: TransferEngine;
  private readonly directories: DirectoryEngine;

  constructor(options: SftpClientOptions) {
    const { logger, transportFactory, localFileSystem: localFs, ...settings } = options;
    this.config = resolveClientConfig(settings);

    const loggerFor = (component: string): LogSink => logger ?? getLogger(`sftp-client.${component}`);
    const localFileSystem = localFs ?? new NodeLocalFileSystem();
    const transportLogger = loggerFor('transport');

    this.session = new TransportSession({
      config: this.config,
      transportFactory: transportFactory ?? (() => new Ssh2SftpTransport(transportLogger)),
      localFileSystem,
      logger: loggerFor('session'),
    });
    const inspector = new RemoteInspector(this.session, this.config.host, loggerFor('session'));
    const preconditions = new Preconditions(this.config, inspector, localFileSystem, (folder) =>
      this.directories.createFolder(folder)
    );
    this.transfers = new TransferEngine({
      config: this.config,
      session: this.session,
      inspector,
      preconditions,
      resolver: new ConflictResolver(() => this.config.overwritePolicy, loggerFor('conflicts')),
      localFileSystem,
      logger: loggerFor('transfer'),
    });
    this.directories = new DirectoryEngine({
      config: this.config,
      session: this.session,
      inspector,
      preconditions,
      transfers: this.transfers,
      logger: loggerFor('directory'),
    });
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Connect timeout in milliseconds; negative restores the default.
   * @throws StateError while connected
   * @throws ConfigurationError for a value that is not a whole number
   */
  withTimeout(timeout: number): this {
    this.assertNotConnected();
    this.config.timeout = validateTimeout(timeout);
    return this;
  }

  withStrictMode(strictMode: boolean): this {
    this.config.strictMode = strictMode;
    return this;
  }

  withOverwritePolicy(policy: OverwritePolicy): this {
    this.config.overwritePolicy = policy;
    return this;
  }

  withTransactional(transactional: boolean): this {
    this.config.transactional = transactional;
    return this;
  }

  withCreateDirsAutomatically(createDirs: boolean): this {
    this.config.createDirsAutomatically = createDirs;
    return this;
  }

  /**
   * Ping the server every `interval` ms in the background.
   * @throws StateError while connected
   * @throws ConfigurationError unless `interval` is a positive whole number
   */
  withKeepAlive(interval?: number): this {
    this.assertNotConnected();
    if (interval !== undefined) {
      this.config.keepAliveInterval = validateKeepAliveInterval(interval);
    }
    this.config.keepAlive = true;
    return this;
  }

  withoutKeepAlive(): this {
    this.assertNotConnected();
    this.config.keepAlive = false;
    return this;
  }

  withHostKeyCheckDisabled(): this {
    this.assertNotConnected();
    this.config.hostIdentity = { mode: 'disabled' };
    return this;
  }

  /**
   * Trust exactly this host key.
   * @param key base64-encoded public key blob, as found in known_hosts
   */
  withHostKey(key: string, keyType: HostKeyType): this {
    this.assertNotConnected();
    this.config.hostIdentity = { mode: 'key', key, keyType };
    return this;
  }

  withKnownHostsFile(file: string): this {
    this.assertNotConnected();
    this.config.hostIdentity = { mode: 'known-hosts', file };
    return this;
  }

  /** Snapshot of the effective configuration, credentials removed */
  describeConfig(): Omit<ClientConfig, 'password' | 'passphrase'> {
    const { password: _password, passphrase: _passphrase, ...rest } = this.config;
    return { ...rest };
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  async connect(): Promise<void> {
    await this.session.connect();
  }

  async disconnect(): Promise<void> {
    await this.session.disconnect();
  }

  isConnected(): boolean {
    return this.session.isActive();
  }

  // ===========================================================================
  // Transfers
  // ===========================================================================

  uploadFile(remotePath: string, localPath: string): Promise<string> {
    return this.transfers.uploadFile(remotePath, localPath);
  }

  uploadFiles(remoteFolder: string, localPaths: string[]): Promise<string[]> {
    return this.transfers.uploadFiles(remoteFolder, localPaths);
  }

  uploadStream(remotePath: string, source: Readable): Promise<string> {
    return this.transfers.uploadStream(remotePath, source);
  }

  /** Holds the whole payload in memory; use uploadStream for large data */
  uploadData(remotePath: string, data: Buffer): Promise<string> {
    return this.transfers.uploadData(remotePath, data);
  }

  downloadFile(remotePath: string, localPath: string): Promise<string> {
    return this.transfers.downloadFile(remotePath, localPath);
  }

  downloadFiles(remoteFolder: string, localFolder: string, wildcard?: string): Promise<string[]> {
    return this.directories.downloadFiles(remoteFolder, localFolder, wildcard);
  }

  downloadToStream(remotePath: string, destination: Writable): Promise<void> {
    return this.transfers.downloadToStream(remotePath, destination);
  }

  /** Buffers the whole file; use downloadToStream for large files */
  downloadData(remotePath: string): Promise<Buffer> {
    return this.transfers.downloadData(remotePath);
  }

  // ===========================================================================
  // Remote files and folders
  // ===========================================================================

  listFiles(folder: string, wildcard?: string): Promise<RemoteFile[]> {
    return this.directories.listFiles(folder, wildcard);
  }

  statRemoteFile(remotePath: string): Promise<RemoteFile | null> {
    return this.directories.statRemoteFile(remotePath);
  }

  renameRemoteFile(oldPath: string, newPath: string): Promise<void> {
    return this.transfers.renameRemoteFile(oldPath, newPath);
  }

  moveFiles(sourceFolder: string, targetFolder: string, wildcard?: string): Promise<number> {
    return this.directories.moveFiles(sourceFolder, targetFolder, wildcard);
  }

  deleteRemoteFile(remotePath: string): Promise<void> {
    return this.transfers.deleteRemoteFile(remotePath);
  }

  deleteFiles(folder: string, wildcard?: string): Promise<number> {
    return this.directories.deleteFiles(folder, wildcard);
  }

  createFolder(folder: string): Promise<void> {
    return this.directories.createFolder(folder);
  }

  deleteFolder(folder: string): Promise<void> {
    return this.directories.deleteFolder(folder);
  }

  private assertNotConnected(): void {
    if (this.session.isActive()) {
      throw new StateError(ACTIVE_CONNECTION_MESSAGE);
    }
  }
}
