/**
 * Host identity verification setup, computed before every connect.
 */

import { ConfigurationError, describeError } from '../errors.js';
import { NodeLocalFileSystem } from '../transport/LocalFileSystem.js';
import type { LocalFileSystem } from '../transport/LocalFileSystem.js';
import { KnownHosts } from './KnownHosts.js';

export enum HostKeyType {
  SSH_RSA = 'ssh-rsa',
  SSH_ED25519 = 'ssh-ed25519',
  ECDSA_SHA2_NISTP256 = 'ecdsa-sha2-nistp256',
  ECDSA_SHA2_NISTP384 = 'ecdsa-sha2-nistp384',
  ECDSA_SHA2_NISTP521 = 'ecdsa-sha2-nistp521',
}

export type HostIdentity =
  /** Accept any host key */
  | { mode: 'disabled' }
  /** Trust exactly this base64-encoded public key blob */
  | { mode: 'key'; key: string; keyType: HostKeyType }
  /** Trust keys recorded for the host in an OpenSSH known_hosts file */
  | { mode: 'known-hosts'; file: string }
  /** Nothing configured; the transport's default behaviour applies */
  | { mode: 'none' };

export interface HostVerification {
  hostVerifier?: (key: Buffer) => boolean;
  /** Set when the connection will not be verified */
  warning?: string;
}

/**
 * Key type embedded at the start of an SSH public key blob
 * (uint32 length + ASCII name), or null if the blob is malformed.
 */
export function keyTypeOfBlob(blob: Buffer): string | null {
  if (blob.length < 4) {
    return null;
  }
  const length = blob.readUInt32BE(0);
  if (length === 0 || blob.length < 4 + length) {
    return null;
  }
  return blob.toString('ascii', 4, 4 + length);
}

export class HostIdentityVerifier {
  constructor(private readonly localFileSystem: LocalFileSystem = new NodeLocalFileSystem()) {}

  async prepare(identity: HostIdentity, host: string, port: number): Promise<HostVerification> {
    switch (identity.mode) {
      case 'disabled':
        return { hostVerifier: () => true, warning: 'Disabling host key check.' };
      case 'key':
        return { hostVerifier: this.explicitKeyVerifier(identity.key, identity.keyType) };
      case 'known-hosts':
        return { hostVerifier: await this.knownHostsVerifier(identity.file, host, port) };
      case 'none':
        return {
          warning: "Host key check is NOT disabled, but no host key or 'known_hosts' file is provided.",
        };
    }
  }

  private explicitKeyVerifier(encodedKey: string, keyType: HostKeyType): (key: Buffer) => boolean {
    const trusted = Buffer.from(encodedKey, 'base64');
    const actualType = keyTypeOfBlob(trusted);
    if (actualType === null) {
      throw new ConfigurationError('Host key is not a valid base64-encoded public key');
    }
    if (actualType !== keyType) {
      throw new ConfigurationError(`Host key is of type '${actualType}', expected '${keyType}'`);
    }
    return (key: Buffer) => key.equals(trusted);
  }

  private async knownHostsVerifier(file: string, host: string, port: number): Promise<(key: Buffer) => boolean> {
    let content: string;
    try {
      content = (await this.localFileSystem.readFile(file)).toString('utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read 'known_hosts' file: ${file} - ${describeError(error)}`, {
        cause: error,
      });
    }
    const knownHosts = KnownHosts.parse(content);
    return (key: Buffer) => knownHosts.isTrusted(host, port, key);
  }
}
