/**
 * Stat and existence queries against the remote side.
 */

import type { ExistenceCheck } from './ConflictResolver.js';
import { describeError } from './errors.js';
import { fileNameOf, parentOf } from './PathResolver.js';
import { RemoteFile } from './RemoteFile.js';
import type { TransportSession } from './session/TransportSession.js';
import type { LogSink } from '../logging/index.js';

export class RemoteInspector implements ExistenceCheck {
  readonly side = 'remote';

  constructor(
    private readonly session: TransportSession,
    private readonly host: string,
    private readonly logger: LogSink
  ) {}

  /**
   * Snapshot of the remote entry, or null if nothing exists at `path`.
   */
  async stat(path: string): Promise<RemoteFile | null> {
    const transport = await this.session.getConnection();
    try {
      const stats = await transport.stat(path);
      if (stats === null) {
        return null;
      }
      return new RemoteFile(this.host, parentOf(path) ?? '', fileNameOf(path), stats.size, stats.type);
    } catch (error) {
      return this.session.handleFailure(error, `Stat failed: ${path}`);
    }
  }

  /**
   * True if anything exists at `path`. A failing stat counts as "does not
   * exist"; failing to obtain a connection does not.
   */
  async exists(path: string): Promise<boolean> {
    const transport = await this.session.getConnection();
    try {
      return (await transport.stat(path)) !== null;
    } catch (error) {
      this.logger.debug('Existence check failed, treating as absent', { path, reason: describeError(error) });
      return false;
    }
  }
}
