/**
 * OpenSSH known_hosts parsing and lookup.
 *
 * Supports plain and hashed (|1|salt|hash) host fields, comma-separated
 * patterns, '*' and '?' wildcards, '!' negation, [host]:port entries and the
 * @revoked marker. @cert-authority lines are ignored.
 */

import { createHmac } from 'crypto';

export interface KnownHostEntry {
  patterns: string[];
  keyType: string;
  key: Buffer;
  revoked: boolean;
}

function parseLine(rawLine: string): KnownHostEntry | null {
  const line = rawLine.trim();
  if (line === '' || line.startsWith('#')) {
    return null;
  }
  const fields = line.split(/\s+/);
  let revoked = false;
  if (fields[0]?.startsWith('@')) {
    const marker = fields.shift();
    if (marker !== '@revoked') {
      return null;
    }
    revoked = true;
  }
  const [hosts, keyType, encodedKey] = fields;
  if (!hosts || !keyType || !encodedKey) {
    return null;
  }
  return {
    patterns: hosts.split(','),
    keyType,
    key: Buffer.from(encodedKey, 'base64'),
    revoked,
  };
}

/**
 * The name a host is recorded under: bare for port 22, [host]:port otherwise.
 */
export function knownHostsName(host: string, port: number): string {
  return port === 22 ? host : `[${host}]:${port}`;
}

function matchesHashed(pattern: string, name: string): boolean {
  const [, magic, salt, hash] = pattern.split('|');
  if (magic !== '1' || !salt || !hash) {
    return false;
  }
  const digest = createHmac('sha1', Buffer.from(salt, 'base64')).update(name).digest('base64');
  return digest === hash;
}

function matchesPattern(pattern: string, name: string): boolean {
  if (pattern.startsWith('|')) {
    return matchesHashed(pattern, name);
  }
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${source}$`, 'i').test(name);
}

function matchesHost(entry: KnownHostEntry, name: string): boolean {
  let matched = false;
  for (const pattern of entry.patterns) {
    if (pattern.startsWith('!')) {
      if (matchesPattern(pattern.substring(1), name)) {
        return false;
      }
    } else if (matchesPattern(pattern, name)) {
      matched = true;
    }
  }
  return matched;
}

export class KnownHosts {
  private constructor(private readonly entries: KnownHostEntry[]) {}

  static parse(content: string): KnownHosts {
    const entries: KnownHostEntry[] = [];
    for (const line of content.split(/\r?\n/)) {
      const entry = parseLine(line);
      if (entry) {
        entries.push(entry);
      }
    }
    return new KnownHosts(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  private entriesFor(host: string, port: number): KnownHostEntry[] {
    const name = knownHostsName(host, port);
    return this.entries.filter((entry) => matchesHost(entry, name));
  }

  /**
   * True if `key` is recorded for the host and not revoked.
   */
  isTrusted(host: string, port: number, key: Buffer): boolean {
    const entries = this.entriesFor(host, port);
    if (entries.some((entry) => entry.revoked && entry.key.equals(key))) {
      return false;
    }
    return entries.some((entry) => !entry.revoked && entry.key.equals(key));
  }
}
