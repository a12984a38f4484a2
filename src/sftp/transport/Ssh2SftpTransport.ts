/**
 * SftpTransport binding over ssh2-sftp-client.
 *
 * One instance wraps one ssh2 connection; the session layer creates a fresh
 * instance for every connect.
 */

import SftpClient from 'ssh2-sftp-client';
import type { Readable, Writable } from 'stream';
import { RemoteFileType } from '../RemoteFile.js';
import type {
  RemoteEntry,
  RemoteStats,
  SftpTransport,
  TransportConnectOptions,
  TransportHealth,
} from './SftpTransport.js';
import type { LogSink } from '../../logging/index.js';

function isNoSuchFile(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const code = error.code;
  return code === 'ENOENT' || code === 2;
}

const SFTP_OP_UNSUPPORTED = 8;

/**
 * True only when the server lacks an extended request. Any other failure
 * (missing source, permissions, a dropped channel) is not a reason to fall back.
 */
function isUnsupportedExtension(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && error.code === SFTP_OP_UNSUPPORTED) {
    return true;
  }
  return error instanceof Error && /does not support this extended request/i.test(error.message);
}

function typeOfStats(stats: SftpClient.FileStats): RemoteFileType {
  if (stats.isDirectory) return RemoteFileType.FOLDER;
  if (stats.isSymbolicLink) return RemoteFileType.LINK;
  if (stats.isFile) return RemoteFileType.FILE;
  return RemoteFileType.SPECIAL;
}

function typeOfEntry(entry: SftpClient.FileInfo): RemoteFileType {
  switch (entry.type) {
    case 'd':
      return RemoteFileType.FOLDER;
    case 'l':
      return RemoteFileType.LINK;
    case '-':
      return RemoteFileType.FILE;
    default:
      return RemoteFileType.SPECIAL;
  }
}

export class Ssh2SftpTransport implements SftpTransport {
  private connected = false;
  private closed = false;
  private eof = false;

  constructor(
    private readonly logger: LogSink,
    private readonly client: SftpClient = new SftpClient()
  ) {}

  async connect(options: TransportConnectOptions): Promise<void> {
    const connectConfig: SftpClient.ConnectOptions = {
      host: options.host,
      port: options.port,
      username: options.username,
      readyTimeout: options.readyTimeout,
      // Reconnects are driven by the session layer, not by the library
      retries: 0,
    };
    if (options.privateKey) {
      connectConfig.privateKey = options.privateKey;
      if (options.passphrase) {
        connectConfig.passphrase = options.passphrase;
      }
    } else if (options.password) {
      connectConfig.password = options.password;
    }
    if (options.hostVerifier) {
      connectConfig.hostVerifier = options.hostVerifier;
    }

    this.client.on('end', this.onEnd);
    this.client.on('close', this.onClose);

    await this.client.connect(connectConfig);
    this.connected = true;
    this.closed = false;
    this.eof = false;
  }

  async end(): Promise<void> {
    try {
      await this.client.end();
    } finally {
      this.connected = false;
      this.closed = true;
      this.client.removeListener('end', this.onEnd);
      this.client.removeListener('close', this.onClose);
    }
  }

  health(): TransportHealth {
    return { connected: this.connected, closed: this.closed, eof: this.eof };
  }

  async sendKeepAlive(): Promise<void> {
    await this.client.cwd();
  }

  async stat(path: string): Promise<RemoteStats | null> {
    try {
      const stats = await this.client.stat(path);
      return { type: typeOfStats(stats), size: stats.size };
    } catch (error) {
      if (isNoSuchFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async list(path: string): Promise<RemoteEntry[]> {
    const entries = await this.client.list(path);
    return entries.map((entry) => ({
      name: entry.name,
      type: typeOfEntry(entry),
      size: entry.size,
    }));
  }

  async get(path: string, destination: string | Writable): Promise<void> {
    await this.client.get(path, destination);
  }

  async read(path: string): Promise<Buffer> {
    const result = await this.client.get(path);
    if (Buffer.isBuffer(result)) {
      return result;
    }
    if (typeof result === 'string') {
      return Buffer.from(result);
    }
    throw new Error(`Unexpected result type from SFTP get: ${path}`);
  }

  async put(source: string | Buffer | Readable, path: string): Promise<void> {
    await this.client.put(source, path);
  }

  async rename(from: string, to: string): Promise<void> {
    try {
      await this.client.posixRename(from, to);
    } catch (error) {
      if (!isUnsupportedExtension(error)) {
        throw error;
      }
      // Servers without posix-rename@openssh.com. Plain SFTP rename refuses
      // an existing target, so it is removed first.
      this.logger.debug('posix rename unavailable, using plain rename', {
        from,
        to,
        reason: error instanceof Error ? error.message : String(error),
      });
      if (await this.client.exists(to)) {
        await this.client.delete(to);
      }
      await this.client.rename(from, to);
    }
  }

  async remove(path: string): Promise<void> {
    await this.client.delete(path);
  }

  async mkdir(path: string): Promise<void> {
    await this.client.mkdir(path, false);
  }

  async rmdir(path: string): Promise<void> {
    await this.client.rmdir(path, false);
  }

  private readonly onEnd = (): void => {
    this.eof = true;
  };

  private readonly onClose = (): void => {
    this.closed = true;
    this.connected = false;
  };
}
