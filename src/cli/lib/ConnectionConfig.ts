/**
 * Connection Config
 *
 * Builds SftpClient settings from SFTP_* environment variables and
 * command-line flags. Flags win over the environment.
 */

import { z } from 'zod';
import { ConfigurationError } from '../../sftp/errors.js';
import { OverwritePolicy } from '../../sftp/ConflictResolver.js';
import { HostKeyType } from '../../sftp/session/HostIdentityVerifier.js';
import type { HostIdentity } from '../../sftp/session/HostIdentityVerifier.js';
import type { SftpClientSettings } from '../../sftp/SftpClientConfig.js';
import type { ConnectionFlags } from '../types/index.js';

/** Unset and blank variables are treated alike */
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const optionalInteger = (name: string) =>
  z.preprocess(
    blankAsUndefined,
    z.coerce.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be an integer`).optional()
  );

const optionalBoolean = (name: string) =>
  z.preprocess(
    (value) => {
      const blank = blankAsUndefined(value);
      return typeof blank === 'string' ? blank.toLowerCase() : blank;
    },
    z
      .enum(['true', 'false', 'yes', 'no', '1', '0'], {
        errorMap: () => ({ message: `${name} must be true or false` }),
      })
      .transform((value) => value === 'true' || value === 'yes' || value === '1')
      .optional()
  );

const optionalPolicy = z.preprocess(
  (value) => {
    const blank = blankAsUndefined(value);
    return typeof blank === 'string' ? blank.toUpperCase().replace(/-/g, '_') : blank;
  },
  z.nativeEnum(OverwritePolicy).optional()
);

const optionalKeyType = z.preprocess(blankAsUndefined, z.nativeEnum(HostKeyType).optional());

export const envSchema = z.object({
  SFTP_HOST: optionalString,
  SFTP_PORT: optionalInteger('SFTP_PORT'),
  SFTP_USER: optionalString,
  SFTP_PASSWORD: optionalString,
  SFTP_PRIVATE_KEY_FILE: optionalString,
  SFTP_PASSPHRASE: optionalString,
  SFTP_TIMEOUT_MS: optionalInteger('SFTP_TIMEOUT_MS'),
  SFTP_KNOWN_HOSTS: optionalString,
  SFTP_HOST_KEY: optionalString,
  SFTP_HOST_KEY_TYPE: optionalKeyType,
  SFTP_NO_HOST_KEY_CHECK: optionalBoolean('SFTP_NO_HOST_KEY_CHECK'),
  SFTP_KEEP_ALIVE_MS: optionalInteger('SFTP_KEEP_ALIVE_MS'),
  SFTP_OVERWRITE: optionalPolicy,
  SFTP_TRANSACTIONAL: optionalBoolean('SFTP_TRANSACTIONAL'),
  SFTP_STRICT: optionalBoolean('SFTP_STRICT'),
  SFTP_CREATE_DIRS: optionalBoolean('SFTP_CREATE_DIRS'),
});

const flagsSchema = z.object({
  host: optionalString,
  port: optionalInteger('--port'),
  user: optionalString,
  password: optionalString,
  key: optionalString,
  passphrase: optionalString,
  timeout: optionalInteger('--timeout'),
  knownHosts: optionalString,
  hostKey: optionalString,
  hostKeyType: optionalKeyType,
  hostKeyCheck: z.boolean().optional(),
  keepAlive: optionalInteger('--keep-alive'),
  overwrite: optionalPolicy,
  transactional: z.boolean().optional(),
  strict: z.boolean().optional(),
  createDirs: z.boolean().optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;
type ParsedFlags = z.infer<typeof flagsSchema>;

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, source: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid ${source} - ${details}`);
  }
  return result.data;
}

function hostIdentityOf(env: ParsedEnv, flags: ParsedFlags): HostIdentity {
  if (flags.hostKeyCheck === false || env.SFTP_NO_HOST_KEY_CHECK === true) {
    return { mode: 'disabled' };
  }
  const key = flags.hostKey ?? env.SFTP_HOST_KEY;
  if (key) {
    const keyType = flags.hostKeyType ?? env.SFTP_HOST_KEY_TYPE;
    if (!keyType) {
      throw new ConfigurationError('A host key needs a key type (--host-key-type or SFTP_HOST_KEY_TYPE)');
    }
    return { mode: 'key', key, keyType };
  }
  const file = flags.knownHosts ?? env.SFTP_KNOWN_HOSTS;
  if (file) {
    return { mode: 'known-hosts', file };
  }
  return { mode: 'none' };
}

/**
 * Merge environment and flags into client settings.
 * @throws ConfigurationError on malformed values or a missing host or user
 */
export function loadConnectionConfig(env: NodeJS.ProcessEnv, rawFlags: ConnectionFlags = {}): SftpClientSettings {
  const vars = parseOrThrow(envSchema, env, 'environment');
  const flags = parseOrThrow(flagsSchema, rawFlags, 'options');

  const host = flags.host ?? vars.SFTP_HOST;
  if (!host) {
    throw new ConfigurationError('No host given (--host or SFTP_HOST)');
  }
  const user = flags.user ?? vars.SFTP_USER;
  if (!user) {
    throw new ConfigurationError('No user given (--user or SFTP_USER)');
  }

  const settings: SftpClientSettings = {
    host,
    user,
    port: flags.port ?? vars.SFTP_PORT,
    password: flags.password ?? vars.SFTP_PASSWORD,
    privateKeyFile: flags.key ?? vars.SFTP_PRIVATE_KEY_FILE,
    passphrase: flags.passphrase ?? vars.SFTP_PASSPHRASE,
    timeout: flags.timeout ?? vars.SFTP_TIMEOUT_MS,
    overwritePolicy: flags.overwrite ?? vars.SFTP_OVERWRITE,
    transactional: flags.transactional ?? vars.SFTP_TRANSACTIONAL,
    strictMode: flags.strict ?? vars.SFTP_STRICT,
    createDirsAutomatically: flags.createDirs ?? vars.SFTP_CREATE_DIRS,
    hostIdentity: hostIdentityOf(vars, flags),
  };

  const keepAliveInterval = flags.keepAlive ?? vars.SFTP_KEEP_ALIVE_MS;
  if (keepAliveInterval !== undefined && keepAliveInterval > 0) {
    settings.keepAlive = true;
    settings.keepAliveInterval = keepAliveInterval;
  }
  return settings;
}
