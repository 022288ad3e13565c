// Types
export type { TableSummary, TableConfig } from './types/table';
export { tableSummary } from './types/table';
export type {
  SourceType,
  SourceKind,
  DatabaseVariant,
  FileFormat,
  ApiProtocol,
  ConnectionConfig,
} from './types/source';
export {
  DATABASE_VARIANTS,
  FILE_FORMATS,
  API_PROTOCOLS,
  sourceTypeKey,
  databaseSource,
  redactConfig,
} from './types/source';
export {
  SourceDeskError,
  UnsupportedSourceError,
  InvalidConfigError,
  ConnectionError,
  IntrospectionError,
  TableNotFoundError,
  UserNotFoundError,
  SessionError,
  DriverTimeoutError,
  ConnectionClosedError,
  DriverRegistrationError,
  ConfigStoreError,
  errorMessage,
} from './types/errors';
export type { ConfigIssue } from './types/errors';

// Interfaces
export type { Connection, ConnectionDetails, DriverDefinition, DriverDeps } from './interfaces/connection';
export type { RemoteConfigStore, StoredConnectionConfig } from './interfaces/config-store';
export type { SessionMinter, Session, SessionClaims } from './interfaces/session-minter';

// Implementations
export { Mutex } from './impl/mutex';
export {
  SharedConnection,
  type CallOptions,
  type SharedConnectionOptions,
} from './impl/shared-connection';
export { DriverRegistry } from './impl/driver-registry';
export { User } from './impl/user';
export {
  HmacSessionMinter,
  DEFAULT_SESSION_TTL_MS,
  type HmacSessionMinterOptions,
} from './impl/hmac-session-minter';
export { MemoryConfigStore } from './impl/memory-config-store';
export {
  ServiceRegistry,
  type ServiceRegistryOptions,
  type RegistryStats,
} from './impl/registry';

// Utils
export { generateId, now } from './utils/id';
export { parseConnectionConfig, connectionConfigSchema } from './utils/validation';
