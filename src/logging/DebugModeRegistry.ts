/**
 * Debug Mode Registry
 *
 * Per-component log level overrides, so DEBUG/TRACE output can be switched on
 * for e.g. "sftp-client.session" without flooding the rest of the log.
 * Module-scoped state with a reset function for tests.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

/**
 * Clear a component's level override, reverting to the global level.
 */
export function clearComponentLevel(name: string): void {
  overrides.delete(name);
}

/**
 * Effective level for a component. An override on a parent component
 * ("sftp-client") applies to its children ("sftp-client.session") unless the
 * child has its own.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | null = name;
  while (current !== null) {
    const level = overrides.get(current);
    if (level) {
      return level;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : null;
  }
  return globalLevel;
}

/**
 * Check if a message at the given level should be emitted for a component.
 */
export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply entries like ["sftp-client.session", "sftp-client.transfer:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  overrides.clear();
}
