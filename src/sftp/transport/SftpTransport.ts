/**
 * Capability interface over the SSH/SFTP wire library.
 *
 * The session layer only talks to this interface, so the ssh2-sftp-client
 * binding can be swapped for an in-process stand-in in tests.
 */

import type { Readable, Writable } from 'stream';
import type { RemoteFileType } from '../RemoteFile.js';

export interface TransportConnectOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: Buffer;
  passphrase?: string;
  /** Milliseconds to wait for the SSH handshake */
  readyTimeout: number;
  /** Called with the raw host key blob; returning false aborts the handshake */
  hostVerifier?: (key: Buffer) => boolean;
}

export interface TransportHealth {
  connected: boolean;
  closed: boolean;
  /** The server signalled end of stream */
  eof: boolean;
}

export interface RemoteStats {
  type: RemoteFileType;
  size: number | null;
}

export interface RemoteEntry extends RemoteStats {
  name: string;
}

export interface SftpTransport {
  connect(options: TransportConnectOptions): Promise<void>;
  end(): Promise<void>;
  health(): TransportHealth;
  /** Lightweight round trip proving the session is alive */
  sendKeepAlive(): Promise<void>;
  /** null if nothing exists at `path` */
  stat(path: string): Promise<RemoteStats | null>;
  list(path: string): Promise<RemoteEntry[]>;
  /** Download into a local file path or a writable stream */
  get(path: string, destination: string | Writable): Promise<void>;
  /** Download fully into memory */
  read(path: string): Promise<Buffer>;
  /** Upload from a local file path, a buffer or a readable stream */
  put(source: string | Buffer | Readable, path: string): Promise<void>;
  /** Rename, replacing an existing target */
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  rmdir(path: string): Promise<void>;
}

export type SftpTransportFactory = () => SftpTransport;
