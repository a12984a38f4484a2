/**
 * TransportSession
 *
 * Owns the one live transport of a client: connects lazily, detects stale
 * connections and replaces them, runs the keep-alive loop.
 *
 * State transitions (connect, disconnect, reconnect, getConnection) are
 * serialized by one SessionLock, so concurrent callers that hit a dead
 * connection trigger exactly one reconnect and all receive the new transport.
 *
 * Known limitation: disconnecting while a transfer is in flight on the same
 * transport is not guarded against; the transfer fails with whatever the
 * transport reports.
 */

import { ConfigurationError, ConnectionError, SftpError, TransferError, describeError, toError } from '../errors.js';
import { describeTarget } from '../SftpClientConfig.js';
import type { ClientConfig } from '../SftpClientConfig.js';
import type { SftpTransport, SftpTransportFactory, TransportConnectOptions } from '../transport/SftpTransport.js';
import type { LocalFileSystem } from '../transport/LocalFileSystem.js';
import { HostIdentityVerifier } from './HostIdentityVerifier.js';
import { KeepAliveScheduler, KeepAliveState } from './KeepAliveScheduler.js';
import { SessionLock } from './SessionLock.js';
import type { LogSink } from '../../logging/index.js';

export enum SessionState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  RECONNECTING = 'RECONNECTING',
}

type Credentials = Pick<TransportConnectOptions, 'password' | 'privateKey' | 'passphrase'>;

export interface TransportSessionDeps {
  config: ClientConfig;
  transportFactory: SftpTransportFactory;
  localFileSystem: LocalFileSystem;
  logger: LogSink;
  verifier?: HostIdentityVerifier;
  /** Clock used for keep-alive bookkeeping */
  now?: () => number;
}

export class TransportSession {
  private transport: SftpTransport | null = null;
  private currentState = SessionState.DISCONNECTED;
  private readonly lock = new SessionLock();
  private readonly keepAlive: KeepAliveState;
  private readonly scheduler: KeepAliveScheduler;

  private readonly config: ClientConfig;
  private readonly transportFactory: SftpTransportFactory;
  private readonly localFileSystem: LocalFileSystem;
  private readonly logger: LogSink;
  private readonly verifier: HostIdentityVerifier;
  private readonly now: () => number;

  constructor(deps: TransportSessionDeps) {
    this.config = deps.config;
    this.transportFactory = deps.transportFactory;
    this.localFileSystem = deps.localFileSystem;
    this.logger = deps.logger;
    this.verifier = deps.verifier ?? new HostIdentityVerifier(this.localFileSystem);
    this.now = deps.now ?? (() => Date.now());
    this.keepAlive = new KeepAliveState(this.config.keepAliveInterval);
    this.scheduler = new KeepAliveScheduler(() => this.config.keepAliveInterval, this.logger);
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** True while a transport is held, connected or not */
  isActive(): boolean {
    return this.transport !== null;
  }

  isKeepAliveRunning(): boolean {
    return this.scheduler.isRunning();
  }

  get keepAliveLastSent(): number {
    return this.keepAlive.lastSentAt;
  }

  /**
   * Current transport; connects if there is none and reconnects if the
   * existing one is closed, at EOF, disconnected or fails a keep-alive.
   * @throws ConnectionError, ConfigurationError
   */
  getConnection(): Promise<SftpTransport> {
    return this.lock.runExclusive(async () => {
      const existing = this.transport;
      if (existing === null) {
        return this.connectUnlocked(SessionState.CONNECTING);
      }
      const staleReason = await this.staleReason(existing);
      if (staleReason === null) {
        return existing;
      }
      this.logger.info('reconnect', { target: describeTarget(this.config), reason: staleReason });
      return this.reconnectUnlocked();
    });
  }

  /**
   * Open a session if none is active.
   */
  async connect(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.transport === null) {
        await this.connectUnlocked(SessionState.CONNECTING);
      }
    });
  }

  /**
   * Close the session. Idempotent; transport errors are logged, not raised.
   */
  disconnect(): Promise<void> {
    return this.lock.runExclusive(() => this.disconnectUnlocked());
  }

  /**
   * Disconnect, then connect again. Connect failures propagate.
   */
  async reconnect(): Promise<void> {
    await this.lock.runExclusive(() => this.reconnectUnlocked());
  }

  /**
   * Ping the server if `forced` or the keep-alive interval has elapsed.
   * Never throws: any failure yields false and forces the next ping.
   */
  async sendKeepAlive(forced = false): Promise<boolean> {
    const transport = this.transport;
    if (transport === null) {
      return false;
    }
    try {
      const now = this.now();
      if (forced || this.keepAlive.isDue(now)) {
        this.logger.trace('Sending keep alive');
        await transport.sendKeepAlive();
        this.keepAlive.markSent(now);
      }
      return true;
    } catch (error) {
      this.keepAlive.forceNext();
      this.logger.warn('keep-alive failure', { target: describeTarget(this.config), reason: describeError(error) });
      return false;
    }
  }

  /**
   * Log a failed operation, force the next keep-alive, and rethrow it as an
   * SftpError (transport errors are wrapped in TransferError).
   */
  handleFailure(error: unknown, context: string): never {
    this.keepAlive.forceNext();
    if (error instanceof SftpError) {
      throw error;
    }
    const message = `${context} - ${describeError(error)}`;
    this.logger.error(message, toError(error));
    throw new TransferError(message, { cause: error });
  }

  private async staleReason(transport: SftpTransport): Promise<string | null> {
    const health = transport.health();
    if (health.closed) return 'closed';
    if (!health.connected) return 'not connected';
    if (health.eof) return 'eof';
    if (!(await this.sendKeepAlive(false))) return 'keep-alive failed';
    return null;
  }

  private async reconnectUnlocked(): Promise<SftpTransport> {
    await this.disconnectUnlocked();
    return this.connectUnlocked(SessionState.RECONNECTING);
  }

  private async connectUnlocked(
    transitional: SessionState.CONNECTING | SessionState.RECONNECTING
  ): Promise<SftpTransport> {
    const target = describeTarget(this.config);
    this.logger.debug('connect attempt', { target, timeout: this.config.timeout });
    this.currentState = transitional;

    const transport = await this.openTransport(target);

    this.transport = transport;
    this.currentState = SessionState.CONNECTED;
    this.keepAlive.interval = this.config.keepAliveInterval;

    this.scheduler.stop();
    if (!(await this.sendKeepAlive(true))) {
      this.logger.warn('Initial keep alive failed', { target });
    }
    if (this.config.keepAlive) {
      this.scheduler.start(() => this.sendKeepAlive(false));
    }

    this.logger.info('connected', { target });
    return transport;
  }

  /**
   * Create and connect a transport. On failure the half-open transport is
   * closed, the next keep-alive is forced and the error is wrapped in a
   * ConnectionError (ConfigurationErrors pass through unchanged).
   */
  private async openTransport(target: string): Promise<SftpTransport> {
    let transport: SftpTransport | null = null;
    try {
      const credentials = await this.resolveCredentials();
      const verification = await this.verifier.prepare(this.config.hostIdentity, this.config.host, this.config.port);
      if (verification.warning) {
        this.logger.warn(verification.warning, { target });
      }

      const created = this.transportFactory();
      transport = created;
      await created.connect({
        host: this.config.host,
        port: this.config.port,
        username: this.config.user,
        readyTimeout: this.config.timeout,
        hostVerifier: verification.hostVerifier,
        ...credentials,
      });
      return created;
    } catch (error) {
      this.currentState = SessionState.DISCONNECTED;
      this.keepAlive.forceNext();
      if (transport !== null) {
        await this.closeQuietly(transport);
      }
      if (error instanceof ConfigurationError) {
        this.logger.error(`Error while connecting to '${target}' - ${error.message}`, error);
        throw error;
      }
      const message = `Error while connecting to '${target}' - ${describeError(error)}`;
      this.logger.error(message, toError(error));
      throw new ConnectionError(message, { cause: error });
    }
  }

  private async disconnectUnlocked(): Promise<void> {
    const transport = this.transport;
    if (transport === null) {
      return;
    }
    this.logger.debug('disconnect', { target: describeTarget(this.config) });
    this.scheduler.stop();
    this.transport = null;
    this.currentState = SessionState.DISCONNECTED;
    this.keepAlive.forceNext();
    await this.closeQuietly(transport);
  }

  private async closeQuietly(transport: SftpTransport): Promise<void> {
    try {
      await transport.end();
    } catch (error) {
      this.logger.warn('Error while disconnecting', { target: describeTarget(this.config), reason: describeError(error) });
    }
  }

  /**
   * A readable private key file wins over a password.
   */
  private async resolveCredentials(): Promise<Credentials> {
    const { privateKeyFile, passphrase, password } = this.config;
    if (privateKeyFile) {
      if (await this.localFileSystem.isReadableFile(privateKeyFile)) {
        this.logger.debug('Using private key authentication', { privateKeyFile });
        return { privateKey: await this.localFileSystem.readFile(privateKeyFile), passphrase };
      }
      this.logger.warn('Private key file is not readable', { privateKeyFile });
    }
    if (password) {
      this.logger.debug('Using password authentication');
      return { password };
    }
    throw new ConfigurationError(
      privateKeyFile
        ? `No credentials given for authentication (private key file '${privateKeyFile}' is not readable)`
        : 'No credentials given for authentication'
    );
  }
}
