/**
 * Overwrite-conflict resolution.
 *
 * Given a desired destination and a way to ask whether a name is taken,
 * returns the name to write to under the configured OverwritePolicy.
 */

import { AlreadyExistsError } from './errors.js';
import { splitExtension } from './PathResolver.js';
import type { LogSink } from '../logging/index.js';

export enum OverwritePolicy {
  /** Fail with AlreadyExistsError */
  NEVER = 'NEVER',
  /** Replace the existing file */
  ALWAYS = 'ALWAYS',
  /** report.txt -> report.1.txt, report.2.txt, ... */
  ADD_SUFFIX_BEFORE_EXTENSION = 'ADD_SUFFIX_BEFORE_EXTENSION',
  /** report.txt -> report.txt.1, report.txt.2, ... */
  ADD_SUFFIX_AFTER_EXTENSION = 'ADD_SUFFIX_AFTER_EXTENSION',
}

/**
 * Answers "does this name already exist" on one side of a transfer.
 */
export interface ExistenceCheck {
  readonly side: 'local' | 'remote';
  exists(path: string): Promise<boolean>;
}

export class ConflictResolver {
  constructor(
    private readonly policy: () => OverwritePolicy,
    private readonly logger: LogSink
  ) {}

  /**
   * Resolve `desiredName` against `existence`.
   *
   * The suffix search checks one candidate at a time and has no upper bound;
   * callers dealing with long pre-existing numbered chains must bound it
   * themselves.
   */
  async resolve(desiredName: string, existence: ExistenceCheck): Promise<string> {
    if (!(await existence.exists(desiredName))) {
      return desiredName;
    }

    const policy = this.policy();
    switch (policy) {
      case OverwritePolicy.NEVER:
        throw new AlreadyExistsError(desiredName);
      case OverwritePolicy.ALWAYS:
        this.logger.debug('conflict resolved', { desiredName, finalName: desiredName, policy, side: existence.side });
        return desiredName;
      case OverwritePolicy.ADD_SUFFIX_BEFORE_EXTENSION:
      case OverwritePolicy.ADD_SUFFIX_AFTER_EXTENSION: {
        const finalName = await this.findFreeName(desiredName, policy, existence);
        this.logger.debug('conflict resolved', { desiredName, finalName, policy, side: existence.side });
        return finalName;
      }
    }
  }

  private async findFreeName(
    desiredName: string,
    policy: OverwritePolicy.ADD_SUFFIX_BEFORE_EXTENSION | OverwritePolicy.ADD_SUFFIX_AFTER_EXTENSION,
    existence: ExistenceCheck
  ): Promise<string> {
    const { base, extension } = splitExtension(desiredName);
    const dottedExtension = extension ? `.${extension}` : '';

    for (let counter = 1; ; counter++) {
      const candidate =
        policy === OverwritePolicy.ADD_SUFFIX_BEFORE_EXTENSION
          ? `${base}.${counter}${dottedExtension}`
          : `${base}${dottedExtension}.${counter}`;
      if (!(await existence.exists(candidate))) {
        return candidate;
      }
    }
  }
}

/**
 * Existence on the local filesystem.
 */
export class LocalExistenceCheck implements ExistenceCheck {
  readonly side = 'local';

  constructor(private readonly fileSystem: { exists(path: string): Promise<boolean> }) {}

  exists(path: string): Promise<boolean> {
    return this.fileSystem.exists(path);
  }
}
