/**
 * Connection contract: the capability set every backend driver provides.
 *
 * The registry and the transport only ever see this interface; the concrete
 * driver is picked at runtime from the config's source type.
 */

import type { ConnectionConfig, SourceType } from '../types/source';
import type { TableConfig, TableSummary } from '../types/table';
import type { RemoteConfigStore } from './config-store';

/**
 * Backend-identifying metadata.
 */
export interface ConnectionDetails {
  readonly connectionId: string;
  /** Driver name, e.g. "mysql" */
  readonly driver: string;
  readonly host?: string;
  readonly port?: number;
  readonly database?: string;
  readonly user?: string;
  readonly serverVersion?: string;
  /** Table configurations saved locally on this instance */
  readonly tableConfigs: Readonly<Record<string, TableConfig>>;
}

export interface Connection {
  readonly connectionId: string;
  readonly sourceType: SourceType;

  /** Backend metadata. Rejects with IntrospectionError if the connection is no longer valid. */
  details(): Promise<ConnectionDetails>;

  /** All visible tables. Resolves to [] when the source has none. */
  loadTables(): Promise<TableSummary[]>;

  /** Rejects only on backend failure, never to signal absence. */
  tableExists(name: string): Promise<boolean>;

  /**
   * Persist a table configuration. `saveLocal` keeps it in this instance's
   * memory (visible through details()); otherwise it goes to the remote store
   * keyed by (connectionId, tableName).
   *
   * Rejects with TableNotFoundError when the table does not exist.
   */
  saveTableConfig(tableName: string, config: TableConfig, saveLocal: boolean): Promise<void>;

  /** Release backend resources. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Collaborators handed to a driver when it is constructed.
 */
export interface DriverDeps {
  configStore: RemoteConfigStore;
}

/**
 * A pluggable backend: the source type it serves and how to construct it.
 */
export interface DriverDefinition {
  readonly name: string;
  readonly sourceType: SourceType;

  /**
   * Construct a connected driver instance.
   * Rejects with ConnectionError when the backend cannot be reached,
   * InvalidConfigError when the config does not fit this backend.
   */
  connect(config: ConnectionConfig, deps: DriverDeps): Promise<Connection>;
}
