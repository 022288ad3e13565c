/**
 * In-memory RemoteConfigStore: for testing and single-instance use.
 */

import type { RemoteConfigStore, StoredConnectionConfig } from '../interfaces/config-store';
import type { ConnectionConfig } from '../types/source';
import type { TableConfig } from '../types/table';
import { now } from '../utils/id';

export class MemoryConfigStore implements RemoteConfigStore {
  private tableConfigs = new Map<string, Map<string, TableConfig>>();
  private connectionConfigs = new Map<string, StoredConnectionConfig[]>();

  async saveTableConfig(connectionId: string, tableName: string, config: TableConfig): Promise<void> {
    let tables = this.tableConfigs.get(connectionId);
    if (!tables) {
      tables = new Map();
      this.tableConfigs.set(connectionId, tables);
    }
    tables.set(tableName, structuredClone(config));
  }

  async getTableConfig(connectionId: string, tableName: string): Promise<TableConfig | null> {
    const config = this.tableConfigs.get(connectionId)?.get(tableName);
    return config ? structuredClone(config) : null;
  }

  async saveConnectionConfig(userId: string, config: ConnectionConfig): Promise<void> {
    const saved = this.connectionConfigs.get(userId) ?? [];
    saved.unshift({ userId, config: structuredClone(config), savedAt: now() });
    this.connectionConfigs.set(userId, saved);
  }

  async listConnectionConfigs(userId: string): Promise<StoredConnectionConfig[]> {
    return (this.connectionConfigs.get(userId) ?? []).map(s => structuredClone(s));
  }

  clear(): void {
    this.tableConfigs.clear();
    this.connectionConfigs.clear();
  }
}
