/**
 * MysqlConnection: Connection contract over a mysql2 pool.
 *
 * Table metadata comes from information_schema for the connection's
 * current schema. Local table configs live on the instance and are
 * reported by details().
 */

import {
  ConnectionClosedError,
  ConnectionError,
  IntrospectionError,
  InvalidConfigError,
  TableNotFoundError,
  errorMessage,
  generateId,
  sourceTypeKey,
  tableSummary,
  type Connection,
  type ConnectionConfig,
  type ConnectionDetails,
  type DriverDeps,
  type RemoteConfigStore,
  type SourceType,
  type TableConfig,
  type TableSummary,
} from '@sourcedesk/core';
import { createMysqlExecutor, type MysqlExecutor, type MysqlExecutorFactory, type MysqlRow } from './executor';
import { DEFAULT_MYSQL_PORT, DETAILS_SQL, LOAD_TABLES_SQL, PING_SQL, TABLE_EXISTS_SQL } from './queries';

export interface MysqlConnectionOptions {
  /** Pool factory (default: mysql2 pool) */
  executorFactory?: MysqlExecutorFactory;
}

// Server answers that retrying with the same config will not fix
const PERMANENT_ERROR_CODES = new Set([
  'ER_ACCESS_DENIED_ERROR',
  'ER_DBACCESS_DENIED_ERROR',
  'ER_BAD_DB_ERROR',
  'ER_NOT_SUPPORTED_AUTH_MODE',
]);

export class MysqlConnection implements Connection {
  readonly sourceType: SourceType = { kind: 'database', database: 'mysql' };
  private readonly localConfigs = new Map<string, TableConfig>();
  private closed = false;

  private constructor(
    readonly connectionId: string,
    private readonly config: ConnectionConfig,
    private readonly executor: MysqlExecutor,
    private readonly configStore: RemoteConfigStore
  ) {}

  /**
   * Open a pool for the config and check that the server answers.
   *
   * @throws InvalidConfigError if the config is not a MySQL config with a host
   * @throws ConnectionError if the server cannot be reached
   */
  static async connect(
    config: ConnectionConfig,
    deps: DriverDeps,
    options: MysqlConnectionOptions = {}
  ): Promise<MysqlConnection> {
    if (config.sourceType.kind !== 'database' || config.sourceType.database !== 'mysql') {
      throw new InvalidConfigError(`MySQL driver cannot serve "${sourceTypeKey(config.sourceType)}"`);
    }
    if (!config.host) {
      throw new InvalidConfigError('MySQL connections need a host', [{ path: '/host', message: 'is required' }]);
    }

    const port = config.port ?? DEFAULT_MYSQL_PORT;
    const connectTimeout = config.options?.connectTimeout;
    const factory = options.executorFactory ?? createMysqlExecutor;
    const executor = factory({
      host: config.host,
      port,
      user: config.username,
      password: config.password,
      database: config.database,
      connectionLimit: 1,
      ...(typeof connectTimeout === 'number' ? { connectTimeout } : {}),
    });

    try {
      await executor.query(PING_SQL);
    } catch (err) {
      await executor.end().catch(endErr => {
        console.error('[MysqlConnection] Failed to end pool after connect error:', endErr);
      });
      throw new ConnectionError(
        `Could not connect to MySQL at ${config.host}:${port}: ${errorMessage(err)}`,
        !PERMANENT_ERROR_CODES.has(errorCode(err) ?? ''),
        err
      );
    }

    return new MysqlConnection(config.connectionId ?? generateId('conn'), config, executor, deps.configStore);
  }

  async details(): Promise<ConnectionDetails> {
    const [row] = await this.run('details', DETAILS_SQL);

    return {
      connectionId: this.connectionId,
      driver: 'mysql',
      host: this.config.host,
      port: this.config.port ?? DEFAULT_MYSQL_PORT,
      database: asString(row?.db) ?? this.config.database,
      user: asString(row?.user) ?? this.config.username,
      serverVersion: asString(row?.version),
      tableConfigs: structuredClone(Object.fromEntries(this.localConfigs)),
    };
  }

  async loadTables(): Promise<TableSummary[]> {
    const rows = await this.run('loadTables', LOAD_TABLES_SQL);

    return rows.map(row =>
      tableSummary({
        name: String(row.name),
        rowCount: asNumber(row.row_count),
        colCount: asNumber(row.col_count),
        created: asTimestamp(row.created),
        updated: asTimestamp(row.updated),
      })
    );
  }

  async tableExists(name: string): Promise<boolean> {
    const [row] = await this.run('tableExists', TABLE_EXISTS_SQL, [name]);
    return (asNumber(row?.count) ?? 0) > 0;
  }

  async saveTableConfig(tableName: string, config: TableConfig, saveLocal: boolean): Promise<void> {
    if (!(await this.tableExists(tableName))) {
      throw new TableNotFoundError(tableName);
    }

    if (saveLocal) {
      this.localConfigs.set(tableName, structuredClone(config));
      return;
    }
    await this.configStore.saveTableConfig(this.connectionId, tableName, config);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.executor.end();
  }

  private async run(operation: string, sql: string, values?: unknown[]): Promise<MysqlRow[]> {
    if (this.closed) {
      throw new ConnectionClosedError(this.connectionId);
    }
    try {
      return await this.executor.query(sql, values);
    } catch (err) {
      throw new IntrospectionError(operation, errorMessage(err), err);
    }
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' || typeof value === 'bigint') {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function asTimestamp(value: unknown): string | undefined {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' && value) return value;
  return undefined;
}
