import type { ConnectionConfig } from '../types/source';
import type { TableConfig } from '../types/table';

export interface StoredConnectionConfig {
  userId: string;
  config: ConnectionConfig;
  savedAt: number;
}

/**
 * Remote configuration store (control plane).
 * Memory implementation lives in core/impl, Postgres in packages/postgres.
 */
export interface RemoteConfigStore {
  /** Save (or replace) the config for one table of one connection */
  saveTableConfig(connectionId: string, tableName: string, config: TableConfig): Promise<void>;

  getTableConfig(connectionId: string, tableName: string): Promise<TableConfig | null>;

  /** Save a user's connection config. Callers pass it redacted. */
  saveConnectionConfig(userId: string, config: ConnectionConfig): Promise<void>;

  /** Newest first */
  listConnectionConfigs(userId: string): Promise<StoredConnectionConfig[]>;
}
