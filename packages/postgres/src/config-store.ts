/**
 * PgConfigStore: Postgres-backed RemoteConfigStore.
 *
 * Configs are stored as JSONB. Saved connection configs are re-validated
 * on read; a row that fails validation rejects with ConfigStoreError.
 */

import {
  ConfigStoreError,
  errorMessage,
  parseConnectionConfig,
  type ConnectionConfig,
  type RemoteConfigStore,
  type StoredConnectionConfig,
  type TableConfig,
} from '@sourcedesk/core';
import type { PgQueryable } from './schema';

export class PgConfigStore implements RemoteConfigStore {
  constructor(private readonly pool: PgQueryable) {}

  async saveTableConfig(connectionId: string, tableName: string, config: TableConfig): Promise<void> {
    await this.run(
      'saveTableConfig',
      `INSERT INTO sd_table_configs (connection_id, table_name, config, updated_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (connection_id, table_name)
       DO UPDATE SET config = EXCLUDED.config, updated_at = EXCLUDED.updated_at`,
      [connectionId, tableName, JSON.stringify(config), Date.now()]
    );
  }

  async getTableConfig(connectionId: string, tableName: string): Promise<TableConfig | null> {
    const rows = await this.run(
      'getTableConfig',
      'SELECT config FROM sd_table_configs WHERE connection_id = $1 AND table_name = $2',
      [connectionId, tableName]
    );
    const [row] = rows;
    if (!isRecord(row)) return null;

    const config = row.config;
    if (!isRecord(config)) {
      throw new ConfigStoreError(`Stored config for table "${tableName}" is not an object`);
    }
    return config;
  }

  async saveConnectionConfig(userId: string, config: ConnectionConfig): Promise<void> {
    await this.run(
      'saveConnectionConfig',
      'INSERT INTO sd_connection_configs (user_id, config, saved_at) VALUES ($1, $2, $3)',
      [userId, JSON.stringify(config), Date.now()]
    );
  }

  async listConnectionConfigs(userId: string): Promise<StoredConnectionConfig[]> {
    const rows = await this.run(
      'listConnectionConfigs',
      `SELECT user_id, config, saved_at FROM sd_connection_configs
       WHERE user_id = $1
       ORDER BY saved_at DESC, id DESC`,
      [userId]
    );
    return rows.map(row => this.toStored(row));
  }

  private toStored(row: unknown): StoredConnectionConfig {
    if (!isRecord(row) || typeof row.user_id !== 'string') {
      throw new ConfigStoreError('Malformed connection config row');
    }
    try {
      return {
        userId: row.user_id,
        config: parseConnectionConfig(row.config),
        // BIGINT columns come back as strings
        savedAt: Number(row.saved_at),
      };
    } catch (err) {
      throw new ConfigStoreError(`Stored connection config is invalid: ${errorMessage(err)}`, err);
    }
  }

  private async run(operation: string, sql: string, values: unknown[]): Promise<unknown[]> {
    try {
      const result = await this.pool.query(sql, values);
      return result.rows;
    } catch (err) {
      throw new ConfigStoreError(`${operation} failed: ${errorMessage(err)}`, err);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
