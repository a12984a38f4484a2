/**
 * Minimal logging surface the SFTP core writes to.
 *
 * The winston-backed {@link Logger} implements it; callers embedding the client
 * in another application can pass any object of this shape instead.
 */
export interface LogSink {
  trace(message: string, metadata?: Record<string, unknown>): void;
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void;
}
