/**
 * Output Formatter
 *
 * Provides consistent output formatting for CLI commands.
 * Supports both table and JSON output formats.
 */

import chalk from 'chalk';
import type { RemoteFile } from '../../sftp/RemoteFile.js';
import { RemoteFileType } from '../../sftp/RemoteFile.js';

// =============================================================================
// Color Helpers
// =============================================================================

type ChalkFn = chalk.Chalk;

/**
 * Get color for a remote entry type
 */
export function getTypeColor(type: RemoteFileType): ChalkFn {
  switch (type) {
    case RemoteFileType.FOLDER:
      return chalk.blue;
    case RemoteFileType.LINK:
      return chalk.cyan;
    case RemoteFileType.SPECIAL:
      return chalk.yellow;
    case RemoteFileType.FILE:
    default:
      return chalk.white;
  }
}

// =============================================================================
// Value Formatters
// =============================================================================

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number | null): string {
  if (bytes === null) return '-';
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

/**
 * Truncate string to max length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str;
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

// =============================================================================
// Table Formatting
// =============================================================================

interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

interface TableOptions {
  columns: TableColumn[];
  border?: boolean;
}

/**
 * Create a simple ASCII table. Cells are measured before coloring, so
 * colorize through `cellColor` rather than inside `data`.
 */
export function createTable(
  data: string[][],
  options: TableOptions,
  cellColor?: (row: number, column: number) => ChalkFn | undefined
): string {
  const { columns, border = true } = options;
  const lines: string[] = [];

  const widths = columns.map((col, i) => {
    const maxDataWidth = Math.max(0, ...data.map((row) => (row[i] ?? '').length));
    return Math.max(col.width, col.header.length, maxDataWidth);
  });

  const h = border ? '─' : '';
  const v = border ? '│' : ' ';

  const renderRow = (cells: string[], rowIndex: number | null): string => {
    const row = columns
      .map((col, i) => {
        const padded = pad(cells[i] ?? '', widths[i] ?? col.width, col.align);
        const color = rowIndex === null ? chalk.bold : cellColor?.(rowIndex, i);
        return color ? color(padded) : padded;
      })
      .map((cell) => (border ? ` ${cell} ` : cell))
      .join(v);
    return border ? v + row + v : row;
  };

  if (border) {
    lines.push('┌' + widths.map((w) => h.repeat(w + 2)).join('┬') + '┐');
  }
  lines.push(renderRow(columns.map((col) => col.header), null));
  if (border) {
    lines.push('├' + widths.map((w) => h.repeat(w + 2)).join('┼') + '┤');
  } else {
    lines.push(widths.map((w) => '-'.repeat(w)).join(' '));
  }
  data.forEach((row, rowIndex) => lines.push(renderRow(row, rowIndex)));
  if (border) {
    lines.push('└' + widths.map((w) => h.repeat(w + 2)).join('┴') + '┘');
  }

  return lines.join('\n');
}

// =============================================================================
// Specific Formatters
// =============================================================================

/**
 * Format a folder listing as a table, folders first, then by name
 */
export function formatRemoteFileTable(files: RemoteFile[]): string {
  const columns: TableColumn[] = [
    { header: 'NAME', width: 32 },
    { header: 'TYPE', width: 7 },
    { header: 'SIZE', width: 10, align: 'right' },
  ];

  const sorted = [...files].sort((a, b) => {
    if (a.isFolder() !== b.isFolder()) {
      return a.isFolder() ? -1 : 1;
    }
    return a.name.localeCompare(b.name);
  });

  const data = sorted.map((file) => [truncate(file.name, 48), file.type, formatBytes(file.size)]);

  return createTable(data, { columns, border: false }, (row, column) => {
    const file = sorted[row];
    return column === 0 && file ? getTypeColor(file.type) : undefined;
  });
}

/**
 * Format a single remote entry as key/value lines
 */
export function formatRemoteFileDetails(file: RemoteFile): string {
  const lines = [
    `${chalk.gray('Name:')}      ${file.name}`,
    `${chalk.gray('Folder:')}    ${file.path || '-'}`,
    `${chalk.gray('Full name:')} ${file.fullName}`,
    `${chalk.gray('Type:')}      ${getTypeColor(file.type)(file.type)}`,
    `${chalk.gray('Size:')}      ${formatBytes(file.size)}`,
    `${chalk.gray('Host:')}      ${file.host}`,
  ];
  return lines.join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

// =============================================================================
// Output Helper
// =============================================================================

export class OutputFormatter {
  private jsonMode: boolean;

  constructor(jsonMode: boolean = false) {
    this.jsonMode = jsonMode;
  }

  isJson(): boolean {
    return this.jsonMode;
  }

  /**
   * Output data (table or JSON based on mode)
   */
  output(tableOutput: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(tableOutput);
    }
  }

  /**
   * Output success message
   */
  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  /**
   * Output error message
   */
  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + chalk.red(message));
      if (details) {
        console.error(chalk.gray(String(details)));
      }
    }
  }

  /**
   * Output warning message
   */
  warn(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ warning: message }));
    } else {
      console.log(chalk.yellow('⚠') + ' ' + message);
    }
  }
}

export default OutputFormatter;
