/**
 * SFTP session client
 *
 * Connection lifecycle, transactional transfers and overwrite-conflict
 * resolution on top of ssh2-sftp-client.
 */

export * from './sftp/index.js';
export {
  LogLevel,
  getLogger,
  initializeLogging,
  setGlobalLevel,
  shutdownLogging,
} from './logging/index.js';
export type { LogSink } from './logging/index.js';
