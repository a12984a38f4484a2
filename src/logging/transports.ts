/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 * INFO  2026-02-10 14:30:15,042 [sftp-client.session] Connected to 'deploy@files.internal:22'
 */

import winston from 'winston';
import type { LogFormat, TimestampFormat } from './config.js';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const MS_PER_MINUTE = 60 * 1000;

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time: the ISO form of the date shifted
 * by the local offset, with the zone marker dropped.
 */
export function localTimestamp(date: Date): string {
  const shifted = new Date(date.getTime() - date.getTimezoneOffset() * MS_PER_MINUTE);
  return shifted.toISOString().slice(0, -1).replace('T', ' ').replace('.', ',');
}

/**
 * Render one log record as a text line (plus stack trace, if any).
 */
export function formatTextLine(
  level: string,
  message: string,
  component: string | undefined,
  errorStack: string | undefined,
  timestamp: string
): string {
  const componentPart = component ? ` [${component}]` : '';
  let line = `${level.toUpperCase().padEnd(5)} ${timestamp}${componentPart} ${message}`;
  if (errorStack) {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : localTimestamp(now);
    const component = typeof info['component'] === 'string' ? info['component'] : undefined;
    const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
    return formatTextLine(info.level, String(info.message), component, errorStack, timestamp);
  });
}

function buildJsonFormat(): winston.Logform.Format {
  return winston.format.combine(winston.format.timestamp(), winston.format.json());
}

/**
 * Console transport. Everything goes to stdout, including errors, so CLI
 * output ordering stays intact.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private readonly format: LogFormat,
    private readonly timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat(this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private readonly filePath: string,
    private readonly format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat('local'),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
