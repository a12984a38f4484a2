import { describe, it, expect } from '@jest/globals';
import { loadConnectionConfig } from '../../../../src/cli/lib/ConnectionConfig.js';
import { OverwritePolicy } from '../../../../src/sftp/ConflictResolver.js';
import { ConfigurationError } from '../../../../src/sftp/errors.js';
import { HostKeyType } from '../../../../src/sftp/session/HostIdentityVerifier.js';

const BASE_ENV = { SFTP_HOST: 'files.example.com', SFTP_USER: 'deploy', SFTP_PASSWORD: 'test-secret' };

describe('loadConnectionConfig', () => {
  it('should read the connection from the environment', () => {
    const settings = loadConnectionConfig({ ...BASE_ENV, SFTP_PORT: '2222', SFTP_TIMEOUT_MS: '5000' });

    expect(settings).toMatchObject({
      host: 'files.example.com',
      user: 'deploy',
      password: 'test-secret',
      port: 2222,
      timeout: 5000,
      hostIdentity: { mode: 'none' },
    });
    expect(settings.keepAlive).toBeUndefined();
  });

  it('should let flags win over the environment', () => {
    const settings = loadConnectionConfig(BASE_ENV, { host: 'other.example.com', port: '2200', strict: false });

    expect(settings.host).toBe('other.example.com');
    expect(settings.port).toBe(2200);
    expect(settings.strictMode).toBe(false);
  });

  it('should treat blank variables as unset', () => {
    const settings = loadConnectionConfig({ ...BASE_ENV, SFTP_PORT: ' ', SFTP_OVERWRITE: '' });

    expect(settings.port).toBeUndefined();
    expect(settings.overwritePolicy).toBeUndefined();
  });

  it.each<[string, OverwritePolicy]>([
    ['never', OverwritePolicy.NEVER],
    ['ALWAYS', OverwritePolicy.ALWAYS],
    ['add-suffix-before-extension', OverwritePolicy.ADD_SUFFIX_BEFORE_EXTENSION],
    ['add_suffix_after_extension', OverwritePolicy.ADD_SUFFIX_AFTER_EXTENSION],
  ])('should accept overwrite policy %s', (value, policy) => {
    expect(loadConnectionConfig({ ...BASE_ENV, SFTP_OVERWRITE: value }).overwritePolicy).toBe(policy);
  });

  it.each<[string, boolean]>([
    ['yes', true],
    ['1', true],
    ['TRUE', true],
    ['no', false],
    ['0', false],
  ])('should read boolean variable value %s', (value, expected) => {
    expect(loadConnectionConfig({ ...BASE_ENV, SFTP_TRANSACTIONAL: value }).transactional).toBe(expected);
  });

  it('should reject malformed values', () => {
    expect(() => loadConnectionConfig({ ...BASE_ENV, SFTP_STRICT: 'maybe' })).toThrow(
      new ConfigurationError('Invalid environment - SFTP_STRICT must be true or false')
    );
    expect(() => loadConnectionConfig({ ...BASE_ENV, SFTP_PORT: 'twenty-two' })).toThrow(
      new ConfigurationError('Invalid environment - SFTP_PORT must be a number')
    );
    expect(() => loadConnectionConfig(BASE_ENV, { timeout: '1.5' })).toThrow(
      new ConfigurationError('Invalid options - --timeout must be an integer')
    );
  });

  it('should require host and user', () => {
    expect(() => loadConnectionConfig({ SFTP_USER: 'deploy' })).toThrow('No host given (--host or SFTP_HOST)');
    expect(() => loadConnectionConfig({ SFTP_HOST: 'files.example.com' })).toThrow('No user given (--user or SFTP_USER)');
  });

  it('should enable keep-alive for a positive interval only', () => {
    expect(loadConnectionConfig(BASE_ENV, { keepAlive: '10000' })).toMatchObject({
      keepAlive: true,
      keepAliveInterval: 10000,
    });
    expect(loadConnectionConfig({ ...BASE_ENV, SFTP_KEEP_ALIVE_MS: '0' }).keepAlive).toBeUndefined();
  });

  describe('host identity', () => {
    it('should disable the check from the flag or the environment', () => {
      expect(loadConnectionConfig(BASE_ENV, { hostKeyCheck: false }).hostIdentity).toEqual({ mode: 'disabled' });
      expect(loadConnectionConfig({ ...BASE_ENV, SFTP_NO_HOST_KEY_CHECK: 'true' }).hostIdentity).toEqual({
        mode: 'disabled',
      });
    });

    it('should trust an explicit key with its type', () => {
      const settings = loadConnectionConfig(BASE_ENV, { hostKey: 'AAAAC3test', hostKeyType: 'ssh-ed25519' });

      expect(settings.hostIdentity).toEqual({ mode: 'key', key: 'AAAAC3test', keyType: HostKeyType.SSH_ED25519 });
    });

    it('should require a key type with an explicit key', () => {
      expect(() => loadConnectionConfig({ ...BASE_ENV, SFTP_HOST_KEY: 'AAAAC3test' })).toThrow(
        'A host key needs a key type (--host-key-type or SFTP_HOST_KEY_TYPE)'
      );
    });

    it('should use a known_hosts file', () => {
      expect(loadConnectionConfig({ ...BASE_ENV, SFTP_KNOWN_HOSTS: '/home/deploy/.ssh/known_hosts' }).hostIdentity).toEqual({
        mode: 'known-hosts',
        file: '/home/deploy/.ssh/known_hosts',
      });
    });

    it('should prefer the explicit key over known_hosts', () => {
      const settings = loadConnectionConfig(
        { ...BASE_ENV, SFTP_KNOWN_HOSTS: '/home/deploy/.ssh/known_hosts' },
        { hostKey: 'AAAAC3test', hostKeyType: 'ssh-ed25519', hostKeyCheck: true }
      );

      expect(settings.hostIdentity?.mode).toBe('key');
    });
  });
});
