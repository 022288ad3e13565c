/**
 * Test fixtures for @sourcedesk/express tests.
 */

import express, { type Express } from 'express';
import request from 'supertest';
import {
  MemoryConfigStore,
  TableNotFoundError,
  tableSummary,
  type Connection,
  type ConnectionConfig,
  type ConnectionDetails,
  type DriverDefinition,
  type RemoteConfigStore,
  type TableConfig,
  type TableSummary,
} from '@sourcedesk/core';
import { SourceDeskExpress } from '../src/sourcedesk-express';

export const TEST_SECRET = 'test-secret';

export const mysqlConfig = {
  sourceType: { kind: 'database', database: 'mysql' },
  host: 'db.internal',
  port: 3306,
  username: 'admin',
  password: 'test-password',
  database: 'shop',
} as const;

export interface StubOptions {
  tables?: TableSummary[];
  /** Delay for loadTables */
  delayMs?: number;
  /** Thrown by connect */
  connectError?: Error;
}

/**
 * In-memory Connection that answers from a fixed table list.
 */
export class StubConnection implements Connection {
  readonly sourceType = { kind: 'database', database: 'mysql' } as const;
  readonly localConfigs = new Map<string, TableConfig>();
  closed = false;

  constructor(
    readonly connectionId: string,
    private readonly config: ConnectionConfig,
    private readonly configStore: RemoteConfigStore,
    private readonly options: StubOptions
  ) {}

  async details(): Promise<ConnectionDetails> {
    return {
      connectionId: this.connectionId,
      driver: 'stub',
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.username,
      tableConfigs: Object.fromEntries(this.localConfigs),
    };
  }

  async loadTables(): Promise<TableSummary[]> {
    if (this.options.delayMs) {
      await new Promise(resolve => setTimeout(resolve, this.options.delayMs));
    }
    return this.tables();
  }

  async tableExists(name: string): Promise<boolean> {
    return this.tables().some(t => t.name === name);
  }

  async saveTableConfig(tableName: string, config: TableConfig, saveLocal: boolean): Promise<void> {
    if (!(await this.tableExists(tableName))) {
      throw new TableNotFoundError(tableName);
    }
    if (saveLocal) {
      this.localConfigs.set(tableName, config);
      return;
    }
    await this.configStore.saveTableConfig(this.connectionId, tableName, config);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private tables(): TableSummary[] {
    return (
      this.options.tables ?? [
        tableSummary({ name: 'customers', rowCount: 120, colCount: 6 }),
        tableSummary({ name: 'orders', rowCount: 40, colCount: 9 }),
      ]
    );
  }
}

export function stubDriver(options: StubOptions = {}): DriverDefinition & { connections: StubConnection[] } {
  const connections: StubConnection[] = [];
  return {
    name: 'stub',
    sourceType: { kind: 'database', database: 'mysql' },
    connections,
    connect: async (config, deps) => {
      if (options.connectError) throw options.connectError;
      const conn = new StubConnection(
        config.connectionId ?? `conn_stub_${connections.length + 1}`,
        config,
        deps.configStore,
        options
      );
      connections.push(conn);
      return conn;
    },
  };
}

export interface TestServer {
  app: Express;
  sourcedesk: SourceDeskExpress;
  configStore: MemoryConfigStore;
  driver: ReturnType<typeof stubDriver>;
}

/**
 * Build an app on the stub driver and an in-memory config store.
 * The request origin comes from the X-Test-Origin header when set.
 */
export async function createTestServer(
  options: StubOptions & { driverTimeoutMs?: number; prefix?: string } = {}
): Promise<TestServer> {
  const app = express();
  app.use(express.json());

  const configStore = new MemoryConfigStore();
  const driver = stubDriver(options);

  const builder = SourceDeskExpress.builder()
    .app(app)
    .sessionSecret(TEST_SECRET)
    .configStore(configStore)
    .withoutMysql()
    .driver(driver)
    .context({ getOrigin: req => req.header('x-test-origin') });

  if (options.driverTimeoutMs !== undefined) builder.driverTimeout(options.driverTimeoutMs);
  if (options.prefix !== undefined) builder.prefix(options.prefix);

  const sourcedesk = await builder.build();
  return { app, sourcedesk, configStore, driver };
}

/**
 * Register a guest for the origin and return its bearer header value.
 */
export async function guestAuth(app: Express, origin = '1.2.3.4'): Promise<string> {
  const response = await request(app).post('/api/auth/guest').set('X-Test-Origin', origin);
  return `Bearer ${String(response.body.token)}`;
}
