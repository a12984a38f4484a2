export { SftpClient } from './SftpClient.js';
export {
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  describeTarget,
  normalizeTimeout,
  optionsSchema,
  resolveClientConfig,
} from './SftpClientConfig.js';
export type { ClientConfig, SftpClientOptions, SftpClientSettings } from './SftpClientConfig.js';
export { ConflictResolver, LocalExistenceCheck, OverwritePolicy } from './ConflictResolver.js';
export type { ExistenceCheck } from './ConflictResolver.js';
export { DirectoryEngine } from './DirectoryEngine.js';
export { TransferEngine, randomTemporaryName } from './TransferEngine.js';
export { Preconditions } from './Preconditions.js';
export { RemoteInspector } from './RemoteInspector.js';
export { RemoteFile, RemoteFileType } from './RemoteFile.js';
export {
  MATCH_ALL,
  REMOTE_SEPARATOR,
  fileNameOf,
  joinRemote,
  matchesWildcard,
  parentOf,
  splitExtension,
  stripTrailingSeparators,
  validateWildcard,
} from './PathResolver.js';
export {
  AlreadyExistsError,
  ConfigurationError,
  ConnectionError,
  InvalidInputError,
  NotFoundError,
  SftpError,
  StateError,
  TransferError,
} from './errors.js';
export { HostIdentityVerifier, HostKeyType, keyTypeOfBlob } from './session/HostIdentityVerifier.js';
export type { HostIdentity, HostVerification } from './session/HostIdentityVerifier.js';
export { KnownHosts, knownHostsName } from './session/KnownHosts.js';
export { DEFAULT_KEEP_ALIVE_INTERVAL, KeepAliveScheduler, KeepAliveState } from './session/KeepAliveScheduler.js';
export { SessionLock } from './session/SessionLock.js';
export { SessionState, TransportSession } from './session/TransportSession.js';
export type { TransportSessionDeps } from './session/TransportSession.js';
export { NodeLocalFileSystem } from './transport/LocalFileSystem.js';
export type { LocalFileSystem } from './transport/LocalFileSystem.js';
export { Ssh2SftpTransport } from './transport/Ssh2SftpTransport.js';
export type {
  RemoteEntry,
  RemoteStats,
  SftpTransport,
  SftpTransportFactory,
  TransportConnectOptions,
  TransportHealth,
} from './transport/SftpTransport.js';
