import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import winston from 'winston';
import Transport from 'winston-transport';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import type { LogTransport } from '../../../src/logging/transports.js';

/** Collects the records winston hands to it */
class MemoryTransport extends Transport {
  readonly records: Array<Record<string, unknown>> = [];

  override log(info: Record<string, unknown>, next: () => void): void {
    this.records.push(info);
    next();
  }
}

function memoryTransport(): { transport: LogTransport; records: Array<Record<string, unknown>> } {
  const sink = new MemoryTransport();
  return {
    records: sink.records,
    transport: {
      name: 'memory',
      createWinstonTransport: (): winston.transport => sink,
    },
  };
}

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env['LOG_LEVEL'] = 'INFO';
    delete process.env['SFTP_DEBUG_COMPONENTS'];
    delete process.env['LOG_FILE'];
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('should respect LOG_LEVEL env var', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('should deliver records to additional transports', () => {
      const { transport, records } = memoryTransport();
      initializeLogging([transport]);

      getLogger('sftp-client.session').info('connected', { target: 'deploy@localhost:22' });

      expect(records).toHaveLength(1);
      expect(records[0]!['message']).toBe('connected');
      expect(records[0]!['component']).toBe('sftp-client.session');
      expect(records[0]!['target']).toBe('deploy@localhost:22');
    });
  });

  describe('getLogger', () => {
    it('should cache Logger instances by component', () => {
      initializeLogging();
      expect(getLogger('component-a')).toBe(getLogger('component-a'));
      expect(getLogger('component-a')).not.toBe(getLogger('component-b'));
    });

    it('should lazy-initialize if called before initializeLogging', () => {
      expect(getLogger('lazy-component')).toBe(getLogger('lazy-component'));
    });

    it('should re-wire cached loggers after re-initialization', () => {
      initializeLogging();
      const before = getLogger('rewire-test');
      const { transport, records } = memoryTransport();
      initializeLogging([transport]);
      const after = getLogger('rewire-test');

      after.warn('after re-init');

      expect(after).not.toBe(before);
      expect(records).toHaveLength(1);
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('should affect Logger level filtering', () => {
      const { transport, records } = memoryTransport();
      initializeLogging([transport]);
      const logger = getLogger('runtime-level-test');

      logger.debug('filtered');
      setGlobalLevel(LogLevel.DEBUG);
      logger.debug('passes');

      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
      expect(records.map((r) => r['message'])).toEqual(['passes']);
    });

    it('should reset to INFO on resetLogging', () => {
      initializeLogging();
      setGlobalLevel(LogLevel.TRACE);
      resetLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('environment integration', () => {
    it('should initialize debug components from SFTP_DEBUG_COMPONENTS', () => {
      process.env['SFTP_DEBUG_COMPONENTS'] = 'sftp-client.transfer:TRACE';
      resetLoggingConfig();
      const { transport, records } = memoryTransport();
      initializeLogging([transport]);

      getLogger('sftp-client.transfer').trace('Uploading to temporary file');
      getLogger('sftp-client.session').debug('connect attempt');

      expect(records.map((r) => r['message'])).toEqual(['Uploading to temporary file']);
    });
  });
});
