/**
 * Log levels understood by the logging subsystem, lowest severity first.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const SEVERITY_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

/**
 * Parse log level from string. Unknown values fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
    case 'INFORMATION':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * True if a message at `messageLevel` passes a `thresholdLevel` filter.
 */
export function shouldDisplayLogLevel(messageLevel: LogLevel, thresholdLevel: LogLevel): boolean {
  return SEVERITY_ORDER.indexOf(messageLevel) >= SEVERITY_ORDER.indexOf(thresholdLevel);
}
