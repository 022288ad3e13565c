/**
 * Express route handlers for SourceDesk.
 */

import type { Request, Response, Router } from 'express';
import {
  InvalidConfigError,
  errorMessage,
  parseConnectionConfig,
  type SharedConnection,
  type TableConfig,
} from '@sourcedesk/core';
import { Routes } from './routes';
import { ServiceTokens } from './tokens';
import {
  asyncHandler,
  createSessionMiddleware,
  requireSourceDeskContext,
  requireUser,
} from './middleware';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalBoolean(body: Record<string, unknown>, field: string): boolean {
  const value = body[field];
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new InvalidConfigError(`Invalid request body`, [{ path: `/${field}`, message: 'must be boolean' }]);
  }
  return value;
}

function requestBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    throw new InvalidConfigError('Invalid request body', [{ path: '/', message: 'must be object' }]);
  }
  return body;
}

function sendNoConnection(res: Response): void {
  res.status(404).json({
    error: { code: 'NO_CONNECTION', message: 'No active connection. POST /api/connections first.' },
  });
}

/**
 * Run fn against the user's current connection, or answer 404.
 */
async function withCurrentConnection(
  req: Request,
  res: Response,
  fn: (conn: SharedConnection) => Promise<void>
): Promise<void> {
  requireUser(req);
  const { container, user } = req.sourcedesk;

  const conn = container.resolve(ServiceTokens.Registry).getConnection(user.id);
  if (!conn) {
    sendNoConnection(res);
    return;
  }
  await fn(conn);
}

/**
 * Register guest session and logout routes.
 */
export function registerAuthRoutes(router: Router): void {
  // POST /api/auth/guest - Register a guest and mint its session
  router.post(
    Routes.GuestSession,
    asyncHandler(async (req: Request, res: Response) => {
      requireSourceDeskContext(req);
      const { container, origin } = req.sourcedesk;

      const session = await container.resolve(ServiceTokens.Registry).createGuestUser(origin);

      res.status(201).json({
        token: session.token,
        userId: session.identity,
        expiresAt: session.expiresAt,
      });
    })
  );

  // POST /api/auth/logout - Log out and close the user's connection
  router.post(
    Routes.Logout,
    createSessionMiddleware(),
    asyncHandler(async (req: Request, res: Response) => {
      requireUser(req);
      const { container, user } = req.sourcedesk;

      await container.resolve(ServiceTokens.Registry).logUserOut(user.id);

      res.status(204).end();
    })
  );
}

/**
 * Register connection routes (open, inspect, close).
 */
export function registerConnectionRoutes(router: Router): void {
  const session = createSessionMiddleware();

  // POST /api/connections - Open a connection, replacing the previous one
  router.post(
    Routes.Connections,
    session,
    asyncHandler(async (req: Request, res: Response) => {
      requireUser(req);
      const { container, user } = req.sourcedesk;

      const body = requestBody(req);
      const config = parseConnectionConfig(body.config);
      const save = optionalBoolean(body, 'save');

      const registry = container.resolve(ServiceTokens.Registry);
      const conn = await registry.connect(user.id, config);
      if (save) {
        await registry.saveConfig(config, user.id);
      }

      if (!conn) {
        res.status(204).end();
        return;
      }
      res.status(201).json(await conn.details());
    })
  );

  // GET /api/connections/current - Details of the current connection
  router.get(
    Routes.CurrentConnection,
    session,
    asyncHandler(async (req: Request, res: Response) => {
      await withCurrentConnection(req, res, async conn => {
        res.json(await conn.details());
      });
    })
  );

  // DELETE /api/connections/current - Close the current connection
  router.delete(
    Routes.CurrentConnection,
    session,
    asyncHandler(async (req: Request, res: Response) => {
      requireUser(req);
      const { container, user } = req.sourcedesk;

      const removed = await container.resolve(ServiceTokens.Registry).removeConnection(user.id);
      if (!removed) {
        sendNoConnection(res);
        return;
      }
      res.status(204).end();
    })
  );
}

/**
 * Register table routes (list, lookup, config).
 */
export function registerTableRoutes(router: Router): void {
  const session = createSessionMiddleware();

  // GET /api/tables - List tables on the current connection
  router.get(
    Routes.Tables,
    session,
    asyncHandler(async (req: Request, res: Response) => {
      await withCurrentConnection(req, res, async conn => {
        res.json({ tables: await conn.loadTables() });
      });
    })
  );

  // GET /api/tables/:tableName - Check that a table exists
  router.get(
    Routes.Table,
    session,
    asyncHandler(async (req: Request, res: Response) => {
      const { tableName } = req.params;
      await withCurrentConnection(req, res, async conn => {
        res.json({ name: tableName, exists: await conn.tableExists(tableName) });
      });
    })
  );

  // PUT /api/tables/:tableName/config - Save a table config locally or remotely
  router.put(
    Routes.TableConfig,
    session,
    asyncHandler(async (req: Request, res: Response) => {
      const { tableName } = req.params;
      const body = requestBody(req);
      const saveLocal = optionalBoolean(body, 'saveLocal');
      const config = body.config;
      if (!isRecord(config)) {
        throw new InvalidConfigError('Invalid table config', [{ path: '/config', message: 'must be object' }]);
      }
      const tableConfig: TableConfig = config;

      await withCurrentConnection(req, res, async conn => {
        await conn.saveTableConfig(tableName, tableConfig, saveLocal);
        res.status(204).end();
      });
    })
  );
}

/**
 * Register health check routes.
 */
export function registerHealthRoutes(router: Router): void {
  // GET /health - Basic health check
  router.get(Routes.Health, (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  // GET /ready - Readiness check (checks dependencies)
  router.get(
    Routes.Ready,
    asyncHandler(async (req: Request, res: Response) => {
      requireSourceDeskContext(req);
      const { container } = req.sourcedesk;

      const checks: Record<string, 'ok' | 'error'> = {};

      const registry = container.tryResolve(ServiceTokens.Registry);
      checks.registry = registry ? 'ok' : 'error';

      const pool = container.tryResolve(ServiceTokens.DatabasePool);
      if (pool) {
        try {
          await pool.query('SELECT 1');
          checks.database = 'ok';
        } catch (err) {
          console.error('[SourceDesk] Readiness check failed for database:', errorMessage(err));
          checks.database = 'error';
        }
      }

      const isReady = Object.values(checks).every(status => status === 'ok');

      res.status(isReady ? 200 : 503).json({
        ready: isReady,
        checks,
        drivers: registry?.drivers.keys() ?? [],
        stats: registry?.stats(),
        timestamp: new Date().toISOString(),
      });
    })
  );
}
