/**
 * CLI-specific type definitions
 */

/**
 * Connection flags as commander parses them. Numbers and policies arrive as
 * strings and are validated by loadConnectionConfig.
 */
export interface ConnectionFlags {
  host?: string;
  port?: string;
  user?: string;
  password?: string;
  /** Private key file */
  key?: string;
  passphrase?: string;
  timeout?: string;
  knownHosts?: string;
  hostKey?: string;
  hostKeyType?: string;
  /** false when --no-host-key-check is given */
  hostKeyCheck?: boolean;
  /** Keep-alive interval in milliseconds */
  keepAlive?: string;
  overwrite?: string;
  transactional?: boolean;
  strict?: boolean;
  createDirs?: boolean;
}

/**
 * Global CLI options available on all commands
 */
export interface GlobalOptions extends ConnectionFlags {
  json?: boolean;
  verbose?: boolean;
}
