/**
 * Pure helpers over remote path strings. Remote paths always use '/'.
 */

import { InvalidInputError } from './errors.js';

export const REMOTE_SEPARATOR = '/';

export const MATCH_ALL = '*';

/**
 * Parent folder of a remote path, or null if the path has no separator.
 *
 * parentOf('/a/b/c') === '/a/b'
 * parentOf('/a') === '/'
 * parentOf('root') === null
 */
export function parentOf(path: string): string | null {
  const index = path.lastIndexOf(REMOTE_SEPARATOR);
  if (index < 0) {
    return null;
  }
  if (index === 0) {
    return path.length > 1 ? REMOTE_SEPARATOR : null;
  }
  return path.substring(0, index);
}

/**
 * Drop trailing separators, keeping a lone '/'.
 */
export function stripTrailingSeparators(path: string): string {
  const stripped = path.replace(/\/+$/, '');
  return stripped === '' && path.startsWith(REMOTE_SEPARATOR) ? REMOTE_SEPARATOR : stripped;
}

/**
 * Last path segment.
 */
export function fileNameOf(path: string): string {
  return path.substring(path.lastIndexOf(REMOTE_SEPARATOR) + 1);
}

/**
 * Join a folder and a name with exactly one separator.
 */
export function joinRemote(folder: string, name: string): string {
  if (folder === '') {
    return name;
  }
  const trimmed = folder.replace(/\/+$/, '');
  return `${trimmed}${REMOTE_SEPARATOR}${name.replace(/^\/+/, '')}`;
}

/**
 * Normalize a filename wildcard. Empty means "everything"; a separator is
 * rejected because wildcards never cross folders.
 */
export function validateWildcard(pattern?: string | null): string {
  const wildcard = pattern ? pattern : MATCH_ALL;
  if (wildcard.includes(REMOTE_SEPARATOR)) {
    throw new InvalidInputError(`Invalid wildcard: ${wildcard}`);
  }
  return wildcard;
}

const wildcardCache = new Map<string, RegExp>();

function wildcardToRegExp(pattern: string): RegExp {
  const cached = wildcardCache.get(pattern);
  if (cached) {
    return cached;
  }
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  const regex = new RegExp(`^${source}$`, 's');
  wildcardCache.set(pattern, regex);
  return regex;
}

/**
 * Case-sensitive whole-name match; '*' matches any run, '?' one character.
 */
export function matchesWildcard(name: string, pattern: string): boolean {
  return pattern === MATCH_ALL || wildcardToRegExp(pattern).test(name);
}

export interface SplitName {
  /** Everything up to (excluding) the extension dot, folder part included */
  base: string;
  /** Extension without the dot; empty if there is none */
  extension: string;
}

/**
 * Split a path into base and extension. Only the last segment is considered,
 * and both '/' and '\' count as separators so local paths work too.
 */
export function splitExtension(path: string): SplitName {
  const nameStart = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\')) + 1;
  const dot = path.lastIndexOf('.');
  if (dot < nameStart) {
    return { base: path, extension: '' };
  }
  return { base: path.substring(0, dot), extension: path.substring(dot + 1) };
}
