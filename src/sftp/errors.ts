/**
 * Error taxonomy of the SFTP client.
 *
 * Every public operation either completes or rejects with one of these.
 * Callers can branch with `instanceof` or on `name`.
 */

/**
 * Base class of all errors raised by the client.
 */
export class SftpError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SftpError';
  }
}

/**
 * Bad or missing credentials, unreadable key material or known_hosts file,
 * invalid options.
 */
export class ConfigurationError extends SftpError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * An argument that can never be valid, e.g. a wildcard containing '/'.
 */
export class InvalidInputError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Transport failure while connecting or reconnecting.
 */
export class ConnectionError extends SftpError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A strict-mode existence check failed for a local or remote file or folder.
 */
export class NotFoundError extends SftpError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The destination exists and the overwrite policy is NEVER.
 */
export class AlreadyExistsError extends SftpError {
  constructor(public readonly path: string) {
    super(`File already exists: ${path}`);
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Connection-affecting configuration was changed while a session is active.
 */
export class StateError extends SftpError {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}

/**
 * Transport failure during a file operation (upload, download, rename, ...).
 */
export class TransferError extends SftpError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransferError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow an unknown thrown value to an Error, wrapping non-errors.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
