import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  shouldLog,
  initFromEnv,
  resetDebugRegistry,
} from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from '../../../src/logging/LogLevel.js';

describe('DebugModeRegistry', () => {
  beforeEach(() => {
    resetDebugRegistry();
  });

  describe('getEffectiveLevel', () => {
    it('should return the global level without overrides', () => {
      expect(getEffectiveLevel('sftp-client', LogLevel.WARN)).toBe(LogLevel.WARN);
    });

    it('should prefer a component override', () => {
      setComponentLevel('sftp-client.session', LogLevel.TRACE);
      expect(getEffectiveLevel('sftp-client.session', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });

    it('should inherit the nearest ancestor override', () => {
      setComponentLevel('sftp-client', LogLevel.DEBUG);
      setComponentLevel('sftp-client.transfer', LogLevel.ERROR);

      expect(getEffectiveLevel('sftp-client.session', LogLevel.INFO)).toBe(LogLevel.DEBUG);
      expect(getEffectiveLevel('sftp-client.transfer', LogLevel.INFO)).toBe(LogLevel.ERROR);
    });

    it('should not treat a name prefix as a parent', () => {
      setComponentLevel('sftp', LogLevel.DEBUG);
      expect(getEffectiveLevel('sftp-client', LogLevel.INFO)).toBe(LogLevel.INFO);
    });
  });

  describe('clearComponentLevel', () => {
    it('should revert to the global level', () => {
      setComponentLevel('engine', LogLevel.TRACE);
      clearComponentLevel('engine');
      expect(getEffectiveLevel('engine', LogLevel.INFO)).toBe(LogLevel.INFO);
    });
  });

  describe('shouldLog', () => {
    it('should compare against the effective level', () => {
      setComponentLevel('engine', LogLevel.DEBUG);
      expect(shouldLog('engine', LogLevel.DEBUG, LogLevel.INFO)).toBe(true);
      expect(shouldLog('engine', LogLevel.TRACE, LogLevel.INFO)).toBe(false);
      expect(shouldLog('other', LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
    });
  });

  describe('initFromEnv', () => {
    it('should default entries without a level to DEBUG', () => {
      initFromEnv(['sftp-client.session', 'sftp-client.transfer:TRACE']);
      expect(getEffectiveLevel('sftp-client.session', LogLevel.INFO)).toBe(LogLevel.DEBUG);
      expect(getEffectiveLevel('sftp-client.transfer', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });
  });
});

describe('LogLevel', () => {
  it('should parse known names and fall back to INFO', () => {
    expect(parseLogLevel(' trace ')).toBe(LogLevel.TRACE);
    expect(parseLogLevel('INFORMATION')).toBe(LogLevel.INFO);
    expect(parseLogLevel('nope')).toBe(LogLevel.INFO);
  });

  it('should order levels by severity', () => {
    expect(shouldDisplayLogLevel(LogLevel.ERROR, LogLevel.WARN)).toBe(true);
    expect(shouldDisplayLogLevel(LogLevel.WARN, LogLevel.WARN)).toBe(true);
    expect(shouldDisplayLogLevel(LogLevel.INFO, LogLevel.WARN)).toBe(false);
  });
});
