import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { KeepAliveScheduler, KeepAliveState } from '../../../../src/sftp/session/KeepAliveScheduler.js';
import { RecordingLogger } from '../../../helpers/RecordingLogger.js';

describe('KeepAliveState', () => {
  it('should be due once the interval has elapsed since the last ping', () => {
    const state = new KeepAliveState(1000);
    state.markSent(5000);

    expect(state.isDue(5999)).toBe(false);
    expect(state.isDue(6000)).toBe(true);
    expect(state.lastSentAt).toBe(5000);
  });

  it('should be due immediately after forceNext', () => {
    const state = new KeepAliveState(1000);
    state.markSent(5000);
    state.forceNext();

    expect(state.isDue(5001)).toBe(true);
    expect(state.lastSentAt).toBe(0);
  });
});

describe('KeepAliveScheduler', () => {
  let logger: RecordingLogger;
  let scheduler: KeepAliveScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    logger = new RecordingLogger();
    scheduler = new KeepAliveScheduler(() => 1000, logger);
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  it('should ping once per interval', async () => {
    const ping = jest.fn(async () => true);
    scheduler.start(ping);

    await jest.advanceTimersByTimeAsync(1000);
    expect(ping).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    expect(ping).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1001);
    expect(ping).toHaveBeenCalledTimes(2);
    expect(scheduler.isRunning()).toBe(true);
  });

  it('should stop after a failed ping and never reconnect itself', async () => {
    const ping = jest.fn(async () => false);
    scheduler.start(ping);

    await jest.advanceTimersByTimeAsync(1001);
    await jest.advanceTimersByTimeAsync(5000);

    expect(ping).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(false);
    expect(logger.messages('warn')).toEqual(['keep-alive failure: connection lost, stopping keep alive loop']);
  });

  it('should stop when the ping throws', async () => {
    const ping = jest.fn(async (): Promise<boolean> => {
      throw new Error('unexpected');
    });
    scheduler.start(ping);

    await jest.advanceTimersByTimeAsync(1001);

    expect(scheduler.isRunning()).toBe(false);
    expect(logger.messages('error')).toEqual(['Keep alive loop failed']);
  });

  it('should not ping after stop', async () => {
    const ping = jest.fn(async () => true);
    scheduler.start(ping);
    scheduler.stop();

    await jest.advanceTimersByTimeAsync(5000);

    expect(ping).not.toHaveBeenCalled();
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should replace a running loop on start', async () => {
    const first = jest.fn(async () => true);
    const second = jest.fn(async () => true);
    scheduler.start(first);
    scheduler.start(second);

    await jest.advanceTimersByTimeAsync(3003);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(3);
  });
});
