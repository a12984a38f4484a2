import { describe, it, expect, beforeEach } from '@jest/globals';
import winston from 'winston';
import { Logger, setGlobalLevelProvider } from '../../../src/logging/Logger.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { resetDebugRegistry, setComponentLevel } from '../../../src/logging/DebugModeRegistry.js';

// Create a silent winston logger that captures calls
function createTestWinston() {
  const calls: Array<{ level: string; message: string; meta: Record<string, unknown> }> = [];
  const logger = winston.createLogger({
    levels: { error: 0, warn: 1, info: 2, debug: 3, trace: 4 },
    level: 'trace', // Accept all levels; filtering is done in Logger
    transports: [
      new winston.transports.Console({
        silent: true,
      }),
    ],
  });

  const originalLog = logger.log.bind(logger);
  logger.log = ((level: string, message: string, ...rest: unknown[]) => {
    const meta = (rest[0] as Record<string, unknown>) ?? {};
    calls.push({ level, message, meta });
    return originalLog(level, message, ...rest);
  }) as typeof logger.log;

  return { logger, calls };
}

describe('Logger', () => {
  let globalLevel: LogLevel;

  beforeEach(() => {
    resetDebugRegistry();
    globalLevel = LogLevel.INFO;
    setGlobalLevelProvider(() => globalLevel);
  });

  describe('basic logging', () => {
    it('should log info messages with the component name', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('sftp-client', winstonLogger);

      log.info('connected');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('info');
      expect(calls[0]!.message).toBe('connected');
      expect(calls[0]!.meta['component']).toBe('sftp-client');
    });

    it('should log warn messages', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.warn('keep-alive failure');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('warn');
    });

    it('should attach message and stack of an Error', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);
      const error = new Error('connection reset');

      log.error('Upload failed', error);

      expect(calls[0]!.level).toBe('error');
      expect(calls[0]!.meta['errorMessage']).toBe('connection reset');
      expect(calls[0]!.meta['errorStack']).toBe(error.stack);
    });

    it('should redact credentials in metadata', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.info('connect attempt', { password: 'test-secret', passphrase: 'test-secret', privateKeyFile: '/k' });

      expect(calls[0]!.meta).toEqual({
        component: 'test',
        password: '[redacted]',
        passphrase: '[redacted]',
        privateKeyFile: '/k',
      });
    });

    it('should include metadata in log calls', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.info('reconnect', { target: 'deploy@example.com:22', reason: 'eof' });

      expect(calls[0]!.meta).toEqual({
        component: 'test',
        target: 'deploy@example.com:22',
        reason: 'eof',
      });
    });
  });

  describe('level filtering', () => {
    it('should not log DEBUG or TRACE when global level is INFO', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.debug('hidden');
      log.trace('hidden');

      expect(calls).toHaveLength(0);
    });

    it('should log TRACE when global level is TRACE', () => {
      globalLevel = LogLevel.TRACE;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.trace('Sending keep alive');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('trace');
    });

    it('should only log ERROR when global level is ERROR', () => {
      globalLevel = LogLevel.ERROR;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.info('no');
      log.warn('no');
      log.error('yes');

      expect(calls.map((c) => c.message)).toEqual(['yes']);
    });
  });

  describe('component-level overrides', () => {
    it('should allow DEBUG for a component with a DEBUG override', () => {
      setComponentLevel('sftp-client.session', LogLevel.DEBUG);
      const { logger: winstonLogger, calls } = createTestWinston();

      new Logger('sftp-client.session', winstonLogger).debug('connect attempt');
      new Logger('sftp-client.transfer', winstonLogger).debug('upload finished');

      expect(calls.map((c) => c.message)).toEqual(['connect attempt']);
    });

    it('should apply a parent override to child components', () => {
      setComponentLevel('sftp-client', LogLevel.DEBUG);
      const { logger: winstonLogger, calls } = createTestWinston();

      new Logger('sftp-client.conflicts', winstonLogger).debug('conflict resolved');

      expect(calls).toHaveLength(1);
    });

    it('should restrict logging when the override is stricter than global', () => {
      setComponentLevel('noisy', LogLevel.ERROR);
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('noisy', winstonLogger);

      log.info('suppressed');
      log.warn('suppressed');

      expect(calls).toHaveLength(0);
    });
  });
});
