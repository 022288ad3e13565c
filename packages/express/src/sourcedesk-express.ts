/**
 * SourceDeskExpress - Main integration class for Express applications.
 *
 * Wires the service registry, its collaborators and the HTTP routes into
 * an existing Express application.
 */

import { Router, type Application, type RequestHandler } from 'express';
import {
  DriverRegistry,
  HmacSessionMinter,
  InvalidConfigError,
  MemoryConfigStore,
  ServiceRegistry,
  type DriverDefinition,
  type RemoteConfigStore,
  type SessionMinter,
} from '@sourcedesk/core';
import { mysqlDriver } from '@sourcedesk/mysql';
import { PgConfigStore, applySchema, type PgQueryable } from '@sourcedesk/postgres';
import { ServiceContainer } from './container';
import { ServiceTokens, type ServiceToken } from './tokens';
import {
  createContextMiddleware,
  createErrorHandler,
  validateServices,
  type ContextMiddlewareOptions,
} from './middleware';
import {
  registerAuthRoutes,
  registerConnectionRoutes,
  registerTableRoutes,
  registerHealthRoutes,
} from './handlers';
import { type RouteConfig, DefaultRouteConfig } from './routes';

export interface SourceDeskExpressConfig {
  /**
   * Express application instance.
   */
  app: Application;

  /**
   * Secret for the default HmacSessionMinter.
   * Required unless `sessions` is given.
   */
  sessionSecret?: string;

  /**
   * Session lifetime for the default minter (default: 24h).
   */
  sessionTtlMs?: number;

  /**
   * Custom session minter.
   */
  sessions?: SessionMinter;

  /**
   * PostgreSQL pool. When set, table and connection configs are stored
   * with PgConfigStore.
   */
  database?: PgQueryable;

  /**
   * Create the config tables on build (default: false).
   */
  applySchema?: boolean;

  /**
   * Custom config store. Takes precedence over `database`.
   */
  configStore?: RemoteConfigStore;

  /**
   * Drivers to register in addition to the defaults.
   */
  drivers?: DriverDefinition[];

  /**
   * Register the MySQL driver (default: true).
   */
  mysql?: boolean;

  /**
   * Timeout applied to every call on a connection.
   */
  driverTimeoutMs?: number;

  /**
   * Route configuration.
   */
  routes?: RouteConfig;

  /**
   * Context middleware options.
   */
  context?: ContextMiddlewareOptions;

  /**
   * Route prefix (default: '').
   */
  prefix?: string;

  /**
   * Additional middleware to apply before SourceDesk routes.
   */
  middleware?: RequestHandler[];

  /**
   * Lifecycle hooks.
   */
  hooks?: {
    /** Called once every service is registered */
    onContainerReady?: (container: ServiceContainer) => void;
    /** Called after routes are registered */
    onRoutesRegistered?: (app: Application) => void;
  };
}

/**
 * Builder for SourceDeskExpress configuration.
 */
export class SourceDeskExpressBuilder {
  private config: Partial<SourceDeskExpressConfig> = {};

  app(app: Application): this {
    this.config.app = app;
    return this;
  }

  sessionSecret(secret: string, ttlMs?: number): this {
    this.config.sessionSecret = secret;
    this.config.sessionTtlMs = ttlMs;
    return this;
  }

  sessions(minter: SessionMinter): this {
    this.config.sessions = minter;
    return this;
  }

  /**
   * Store configs in Postgres.
   */
  database(pool: PgQueryable, options: { applySchema?: boolean } = {}): this {
    this.config.database = pool;
    this.config.applySchema = options.applySchema;
    return this;
  }

  configStore(store: RemoteConfigStore): this {
    this.config.configStore = store;
    return this;
  }

  /**
   * Add a driver.
   */
  driver(driver: DriverDefinition): this {
    this.config.drivers = [...(this.config.drivers ?? []), driver];
    return this;
  }

  /**
   * Skip the built-in MySQL driver.
   */
  withoutMysql(): this {
    this.config.mysql = false;
    return this;
  }

  driverTimeout(ms: number): this {
    this.config.driverTimeoutMs = ms;
    return this;
  }

  routes(config: RouteConfig): this {
    this.config.routes = config;
    return this;
  }

  prefix(prefix: string): this {
    this.config.prefix = prefix;
    return this;
  }

  use(...middleware: RequestHandler[]): this {
    this.config.middleware = [...(this.config.middleware ?? []), ...middleware];
    return this;
  }

  context(options: ContextMiddlewareOptions): this {
    this.config.context = options;
    return this;
  }

  hooks(hooks: SourceDeskExpressConfig['hooks']): this {
    this.config.hooks = { ...this.config.hooks, ...hooks };
    return this;
  }

  /**
   * Build the SourceDeskExpress instance, applying the schema first when
   * requested.
   */
  async build(): Promise<SourceDeskExpress> {
    const { app, ...rest } = this.config;
    if (!app) {
      throw new Error('Express app is required. Call .app(expressApp) first.');
    }

    if (rest.database && rest.applySchema) {
      await applySchema(rest.database);
    }

    return new SourceDeskExpress({ ...rest, app });
  }
}

/**
 * @example
 * ```typescript
 * import express from 'express';
 * import { createPgPool } from '@sourcedesk/postgres';
 * import { SourceDeskExpress, resolveServerOptions } from '@sourcedesk/express';
 *
 * const options = resolveServerOptions();
 * const app = express();
 * app.use(express.json());
 *
 * const sourcedesk = await SourceDeskExpress.builder()
 *   .app(app)
 *   .sessionSecret(options.sessionSecret, options.sessionTtlMs)
 *   .database(createPgPool({ connectionString: options.databaseUrl }), { applySchema: true })
 *   .prefix(options.prefix)
 *   .build();
 *
 * app.listen(3000);
 * ```
 */
export class SourceDeskExpress {
  private container: ServiceContainer;
  private app: Application;
  private config: SourceDeskExpressConfig;
  private _initialized = false;

  constructor(config: SourceDeskExpressConfig) {
    this.config = {
      ...config,
      routes: { ...DefaultRouteConfig, ...config.routes },
    };
    this.app = config.app;
    this.container = new ServiceContainer();

    this.setupContainer();
    this.setupRoutes();
  }

  get isInitialized(): boolean {
    return this._initialized;
  }

  static builder(): SourceDeskExpressBuilder {
    return new SourceDeskExpressBuilder();
  }

  getContainer(): ServiceContainer {
    return this.container;
  }

  resolve<T>(token: ServiceToken<T>): T {
    return this.container.resolve(token);
  }

  get registry(): ServiceRegistry {
    return this.container.resolve(ServiceTokens.Registry);
  }

  /**
   * Register a driver after construction.
   */
  registerDriver(driver: DriverDefinition): void {
    this.container.resolve(ServiceTokens.DriverRegistry).register(driver);
  }

  /**
   * Close every open connection and forget all users.
   */
  async shutdown(): Promise<void> {
    const { users, connections } = this.registry.stats();
    console.log(`[SourceDesk] Shutting down (${users} users, ${connections} connections)`);
    await this.registry.shutdown();
  }

  private setupContainer(): void {
    const { app, database, configStore, sessions, sessionSecret, sessionTtlMs, driverTimeoutMs } = this.config;

    this.container.registerInstance(ServiceTokens.ExpressApp, app);

    if (database) {
      this.container.registerInstance(ServiceTokens.DatabasePool, database);
    }

    this.container.registerInstance(
      ServiceTokens.ConfigStore,
      configStore ?? (database ? new PgConfigStore(database) : new MemoryConfigStore())
    );

    if (sessions) {
      this.container.registerInstance(ServiceTokens.SessionMinter, sessions);
    } else if (sessionSecret) {
      this.container.registerInstance(
        ServiceTokens.SessionMinter,
        new HmacSessionMinter({ secret: sessionSecret, ttlMs: sessionTtlMs })
      );
    } else {
      throw new InvalidConfigError('A session secret or session minter is required', [
        { path: 'sessionSecret', message: 'is required' },
      ]);
    }

    const drivers = new DriverRegistry();
    if (this.config.mysql !== false) {
      drivers.register(mysqlDriver);
    }
    for (const driver of this.config.drivers ?? []) {
      drivers.register(driver);
    }
    this.container.registerInstance(ServiceTokens.DriverRegistry, drivers);

    this.container.registerFactory(
      ServiceTokens.Registry,
      c =>
        new ServiceRegistry({
          sessions: c.resolve(ServiceTokens.SessionMinter),
          drivers: c.resolve(ServiceTokens.DriverRegistry),
          configStore: c.resolve(ServiceTokens.ConfigStore),
          driverTimeoutMs,
        })
    );

    this.config.hooks?.onContainerReady?.(this.container);
  }

  private setupRoutes(): void {
    const { routes, prefix = '', middleware = [], context } = this.config;

    validateServices(this.container, [ServiceTokens.Registry, ServiceTokens.SessionMinter]);

    const router = Router();

    router.use(createContextMiddleware(this.container, context));

    for (const mw of middleware) {
      router.use(mw);
    }

    if (routes?.auth) {
      registerAuthRoutes(router);
    }

    if (routes?.connections) {
      registerConnectionRoutes(router);
    }

    if (routes?.tables) {
      registerTableRoutes(router);
    }

    if (routes?.health) {
      registerHealthRoutes(router);
    }

    router.use(createErrorHandler());

    if (prefix) {
      this.app.use(prefix, router);
    } else {
      this.app.use(router);
    }

    this.config.hooks?.onRoutesRegistered?.(this.app);

    this._initialized = true;
  }
}
