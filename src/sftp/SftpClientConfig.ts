/**
 * Client configuration: options accepted by the SftpClient constructor,
 * their defaults, and validation.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { OverwritePolicy } from './ConflictResolver.js';
import { HostKeyType } from './session/HostIdentityVerifier.js';
import type { HostIdentity } from './session/HostIdentityVerifier.js';
import { DEFAULT_KEEP_ALIVE_INTERVAL } from './session/KeepAliveScheduler.js';
import type { SftpTransportFactory } from './transport/SftpTransport.js';
import type { LocalFileSystem } from './transport/LocalFileSystem.js';
import type { LogSink } from '../logging/index.js';

export const DEFAULT_PORT = 22;
export const DEFAULT_TIMEOUT = 30 * 1000;

const hostIdentitySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('disabled') }),
  z.object({ mode: z.literal('key'), key: z.string().min(1), keyType: z.nativeEnum(HostKeyType) }),
  z.object({ mode: z.literal('known-hosts'), file: z.string().min(1) }),
  z.object({ mode: z.literal('none') }),
]);

export const optionsSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  user: z.string().min(1, 'user is required'),
  password: z.string().optional(),
  privateKeyFile: z.string().min(1).optional(),
  passphrase: z.string().optional(),
  timeout: z.number().int().optional(),
  strictMode: z.boolean().default(true),
  overwritePolicy: z.nativeEnum(OverwritePolicy).default(OverwritePolicy.NEVER),
  transactional: z.boolean().default(true),
  createDirsAutomatically: z.boolean().default(false),
  keepAlive: z.boolean().default(false),
  keepAliveInterval: z.number().int().positive().default(DEFAULT_KEEP_ALIVE_INTERVAL),
  hostIdentity: hostIdentitySchema.default({ mode: 'none' }),
});

function describeIssues(issues: z.ZodIssue[], prefix: Array<string | number> = []): string {
  return issues
    .map((issue) => `${[...prefix, ...issue.path].join('.') || 'options'}: ${issue.message}`)
    .join('; ');
}

export type SftpClientSettings = z.input<typeof optionsSchema>;

/**
 * Options accepted by the SftpClient constructor.
 */
export interface SftpClientOptions extends SftpClientSettings {
  /** Log sink; defaults to the 'sftp-client' winston logger */
  logger?: LogSink;
  /** Creates one transport per connect; defaults to the ssh2-sftp-client binding */
  transportFactory?: SftpTransportFactory;
  /** Local side of transfers; defaults to node:fs */
  localFileSystem?: LocalFileSystem;
}

/**
 * Resolved configuration shared by the session and the engines. Mutated
 * only through the SftpClient's with*() methods.
 */
export interface ClientConfig {
  host: string;
  port: number;
  user: string;
  password?: string;
  privateKeyFile?: string;
  passphrase?: string;
  timeout: number;
  strictMode: boolean;
  overwritePolicy: OverwritePolicy;
  transactional: boolean;
  createDirsAutomatically: boolean;
  keepAlive: boolean;
  keepAliveInterval: number;
  hostIdentity: HostIdentity;
}

/**
 * Negative timeouts mean "use the default".
 */
export function normalizeTimeout(timeout: number | undefined): number {
  return timeout === undefined || timeout < 0 ? DEFAULT_TIMEOUT : timeout;
}

/**
 * Validate constructor options and apply defaults.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveClientConfig(options: SftpClientSettings): ClientConfig {
  const result = optionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(`Invalid SFTP client options - ${describeIssues(result.error.issues)}`);
  }
  const parsed = result.data;
  return {
    host: parsed.host,
    port: parsed.port,
    user: parsed.user,
    password: parsed.password,
    privateKeyFile: parsed.privateKeyFile,
    passphrase: parsed.passphrase,
    timeout: normalizeTimeout(parsed.timeout),
    strictMode: parsed.strictMode,
    overwritePolicy: parsed.overwritePolicy,
    transactional: parsed.transactional,
    createDirsAutomatically: parsed.createDirsAutomatically,
    keepAlive: parsed.keepAlive,
    keepAliveInterval: parsed.keepAliveInterval,
    hostIdentity: parsed.hostIdentity,
  };
}

function parseField<T>(field: z.ZodType<T, z.ZodTypeDef, unknown>, name: string, value: unknown): T {
  const result = field.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid SFTP client options - ${describeIssues(result.error.issues, [name])}`);
  }
  return result.data;
}

/**
 * Checked the same way as the constructor option; negative restores the default.
 * @throws ConfigurationError
 */
export function validateTimeout(timeout: number): number {
  return normalizeTimeout(parseField(optionsSchema.shape.timeout, 'timeout', timeout));
}

/**
 * @throws ConfigurationError unless a positive whole number of milliseconds
 */
export function validateKeepAliveInterval(interval: number): number {
  return parseField(optionsSchema.shape.keepAliveInterval, 'keepAliveInterval', interval);
}

/**
 * user@host:port, used in log lines and error messages.
 */
export function describeTarget(config: Pick<ClientConfig, 'user' | 'host' | 'port'>): string {
  return `${config.user}@${config.host}:${config.port}`;
}
