/**
 * Keep-alive bookkeeping and the background ping loop.
 */

import type { LogSink } from '../../logging/index.js';

export const DEFAULT_KEEP_ALIVE_INTERVAL = 5000;

/**
 * When the last keep-alive went out. Read and written by both request code
 * and the background loop without further locking: a stale read costs at
 * most one extra ping.
 */
export class KeepAliveState {
  private lastSent = 0;

  constructor(public interval: number = DEFAULT_KEEP_ALIVE_INTERVAL) {}

  isDue(now: number): boolean {
    return now >= this.lastSent + this.interval;
  }

  markSent(now: number): void {
    this.lastSent = now;
  }

  /** Make the next check send a ping regardless of the interval */
  forceNext(): void {
    this.lastSent = 0;
  }

  get lastSentAt(): number {
    return this.lastSent;
  }
}

/**
 * Periodically calls `ping` until it reports failure or `stop()` is called.
 * The loop never reconnects; the next request-driven getConnection() does.
 */
export class KeepAliveScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopped = true;
  private runs = 0;

  constructor(
    private readonly interval: () => number,
    private readonly logger: LogSink
  ) {}

  /**
   * Start the loop, stopping a running one first.
   */
  start(ping: () => Promise<boolean>): void {
    this.stop();
    this.stopped = false;
    const run = ++this.runs;
    this.logger.debug('Starting keep alive loop', { interval: this.interval() });
    this.schedule(run, ping);
  }

  /**
   * Cooperative stop: a ping already in flight completes, but nothing is
   * scheduled after it.
   */
  stop(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (!this.stopped) {
      this.logger.debug('Stopping keep alive loop');
    }
    this.stopped = true;
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  private schedule(run: number, ping: () => Promise<boolean>): void {
    // +1 so the interval has strictly elapsed when the ping checks it
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick(run, ping).catch((error: unknown) => {
        this.stopped = true;
        this.logger.error('Keep alive loop failed', error instanceof Error ? error : new Error(String(error)));
      });
    }, this.interval() + 1);
    this.timer.unref();
  }

  private async tick(run: number, ping: () => Promise<boolean>): Promise<void> {
    if (this.stopped || run !== this.runs) {
      return;
    }
    const alive = await ping();
    if (this.stopped || run !== this.runs) {
      return;
    }
    if (!alive) {
      this.logger.warn('keep-alive failure: connection lost, stopping keep alive loop');
      this.stopped = true;
      return;
    }
    this.schedule(run, ping);
  }
}
