import { joinRemote } from './PathResolver.js';

export enum RemoteFileType {
  FILE = 'FILE',
  FOLDER = 'FOLDER',
  LINK = 'LINK',
  SPECIAL = 'SPECIAL',
}

/**
 * Immutable snapshot of a stat or listing result.
 */
export class RemoteFile {
  constructor(
    readonly host: string,
    /** Folder containing the entry */
    readonly path: string,
    readonly name: string,
    /** Size in bytes, null if the server did not report one */
    readonly size: number | null,
    readonly type: RemoteFileType
  ) {
    Object.freeze(this);
  }

  get fullName(): string {
    return joinRemote(this.path, this.name);
  }

  isFile(): boolean {
    return this.type === RemoteFileType.FILE;
  }

  isFolder(): boolean {
    return this.type === RemoteFileType.FOLDER;
  }

  toJSON(): Record<string, unknown> {
    return {
      host: this.host,
      path: this.path,
      name: this.name,
      fullName: this.fullName,
      size: this.size,
      type: this.type,
    };
  }
}
