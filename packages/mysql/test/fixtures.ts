/**
 * In-process stand-in for a mysql2 pool.
 */

import { vi } from 'vitest';
import type { PoolOptions } from 'mysql2/promise';
import type { MysqlExecutor, MysqlRow } from '../src/executor';
import { DETAILS_SQL, LOAD_TABLES_SQL, PING_SQL, TABLE_EXISTS_SQL } from '../src/queries';

export interface FakeMysqlOptions {
  /** Rows returned by the information_schema table listing */
  tables?: MysqlRow[];
  /** Thrown by the connect-time ping */
  pingError?: Error;
  /** Thrown by every query after the ping */
  queryError?: Error;
}

export class FakeMysqlExecutor implements MysqlExecutor {
  readonly queries: Array<{ sql: string; values?: unknown[] }> = [];
  endCalls = 0;

  constructor(private readonly options: FakeMysqlOptions = {}) {}

  async query(sql: string, values?: unknown[]): Promise<MysqlRow[]> {
    this.queries.push({ sql, values });

    if (sql === PING_SQL) {
      if (this.options.pingError) throw this.options.pingError;
      return [{ ok: 1 }];
    }
    if (this.options.queryError) throw this.options.queryError;

    const tables = this.options.tables ?? [];
    switch (sql) {
      case DETAILS_SQL:
        return [{ version: '8.0.36', db: 'shop', user: 'admin@%' }];
      case LOAD_TABLES_SQL:
        return tables;
      case TABLE_EXISTS_SQL:
        return [{ count: tables.some(t => t.name === values?.[0]) ? 1 : 0 }];
      default:
        throw new Error(`Unexpected SQL: ${sql}`);
    }
  }

  async end(): Promise<void> {
    this.endCalls++;
  }
}

/**
 * Executor factory that records the pool options it was given.
 */
export function fakeExecutorFactory(executor: FakeMysqlExecutor) {
  return vi.fn((_options: PoolOptions) => executor);
}

export const sampleTables: MysqlRow[] = [
  {
    name: 'customers',
    row_count: 120,
    col_count: 6,
    created: new Date('2024-01-15T10:30:00.000Z'),
    updated: new Date('2024-03-01T08:00:00.000Z'),
  },
  {
    name: 'orders',
    row_count: null,
    col_count: '9',
    created: new Date('2024-02-01T00:00:00.000Z'),
    updated: null,
  },
];
