export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export type { LogSink } from './LogSink.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
export { setComponentLevel, clearComponentLevel, resetDebugRegistry } from './DebugModeRegistry.js';
export type { LogTransport } from './transports.js';
