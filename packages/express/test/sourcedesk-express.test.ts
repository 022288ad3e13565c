/**
 * Tests for SourceDeskExpress wiring.
 */

import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { HmacSessionMinter, InvalidConfigError, MemoryConfigStore, ServiceRegistry } from '@sourcedesk/core';
import { PgConfigStore, schema, type PgQueryable } from '@sourcedesk/postgres';
import { SourceDeskExpress } from '../src/sourcedesk-express';
import { ServiceTokens } from '../src/tokens';
import { TEST_SECRET, createTestServer, guestAuth, mysqlConfig, stubDriver } from './fixtures';

function fakePool() {
  const query = vi.fn(async (_sql: string, _values?: unknown[]) => ({ rows: [], rowCount: 0 }));
  const pool: PgQueryable = { query };
  return { pool, query };
}

describe('SourceDeskExpress', () => {
  describe('builder', () => {
    it('requires an app', async () => {
      await expect(SourceDeskExpress.builder().sessionSecret(TEST_SECRET).build()).rejects.toThrow(
        'Express app is required'
      );
    });

    it('requires a session secret or minter', async () => {
      await expect(SourceDeskExpress.builder().app(express()).build()).rejects.toBeInstanceOf(InvalidConfigError);
    });

    it('accepts a custom session minter', async () => {
      const sessions = new HmacSessionMinter({ secret: TEST_SECRET });

      const sourcedesk = await SourceDeskExpress.builder().app(express()).sessions(sessions).build();

      expect(sourcedesk.resolve(ServiceTokens.SessionMinter)).toBe(sessions);
      expect(sourcedesk.isInitialized).toBe(true);
    });

    it('applies the schema when asked', async () => {
      const { pool, query } = fakePool();

      await SourceDeskExpress.builder()
        .app(express())
        .sessionSecret(TEST_SECRET)
        .database(pool, { applySchema: true })
        .build();

      expect(query).toHaveBeenCalledWith(schema);
    });
  });

  describe('container', () => {
    it('registers the MySQL driver by default', async () => {
      const sourcedesk = await SourceDeskExpress.builder().app(express()).sessionSecret(TEST_SECRET).build();

      expect(sourcedesk.registry).toBeInstanceOf(ServiceRegistry);
      expect(sourcedesk.registry.drivers.keys()).toEqual(['database:mysql']);
    });

    it('uses the same registry for every resolve', async () => {
      const sourcedesk = await SourceDeskExpress.builder().app(express()).sessionSecret(TEST_SECRET).build();

      expect(sourcedesk.registry).toBe(sourcedesk.resolve(ServiceTokens.Registry));
    });

    it('stores configs in memory without a database', async () => {
      const sourcedesk = await SourceDeskExpress.builder().app(express()).sessionSecret(TEST_SECRET).build();

      expect(sourcedesk.resolve(ServiceTokens.ConfigStore)).toBeInstanceOf(MemoryConfigStore);
      expect(sourcedesk.getContainer().has(ServiceTokens.DatabasePool)).toBe(false);
    });

    it('stores configs in Postgres with a database', async () => {
      const { pool } = fakePool();

      const sourcedesk = await SourceDeskExpress.builder().app(express()).sessionSecret(TEST_SECRET).database(pool).build();

      expect(sourcedesk.resolve(ServiceTokens.ConfigStore)).toBeInstanceOf(PgConfigStore);
      expect(sourcedesk.registry.configStore).toBeInstanceOf(PgConfigStore);
    });

    it('prefers an explicit config store', async () => {
      const { pool } = fakePool();
      const store = new MemoryConfigStore();

      const sourcedesk = await SourceDeskExpress.builder()
        .app(express())
        .sessionSecret(TEST_SECRET)
        .database(pool)
        .configStore(store)
        .build();

      expect(sourcedesk.registry.configStore).toBe(store);
    });

    it('registers drivers after construction', async () => {
      const sourcedesk = await SourceDeskExpress.builder().app(express()).sessionSecret(TEST_SECRET).withoutMysql().build();

      sourcedesk.registerDriver(stubDriver());

      expect(sourcedesk.registry.drivers.keys()).toEqual(['database:mysql']);
    });

    it('runs lifecycle hooks', async () => {
      const onContainerReady = vi.fn();
      const onRoutesRegistered = vi.fn();
      const app = express();

      await SourceDeskExpress.builder()
        .app(app)
        .sessionSecret(TEST_SECRET)
        .hooks({ onContainerReady, onRoutesRegistered })
        .build();

      expect(onContainerReady).toHaveBeenCalledTimes(1);
      expect(onRoutesRegistered).toHaveBeenCalledWith(app);
    });
  });

  describe('routes', () => {
    it('mounts routes under the prefix', async () => {
      const { app } = await createTestServer({ prefix: '/admin' });

      expect((await request(app).get('/admin/health')).status).toBe(200);
      expect((await request(app).get('/health')).status).toBe(404);
    });

    it('skips disabled route groups', async () => {
      const app = express();
      app.use(express.json());
      await SourceDeskExpress.builder()
        .app(app)
        .sessionSecret(TEST_SECRET)
        .routes({ tables: false })
        .build();

      expect((await request(app).get('/api/tables')).status).toBe(404);
      expect((await request(app).get('/health')).status).toBe(200);
    });

    it('applies custom middleware before the routes', async () => {
      const app = express();
      const seen = vi.fn();
      await SourceDeskExpress.builder()
        .app(app)
        .sessionSecret(TEST_SECRET)
        .use((req, _res, next) => {
          seen(req.path);
          next();
        })
        .build();

      await request(app).get('/health');

      expect(seen).toHaveBeenCalledWith('/health');
    });
  });

  describe('shutdown', () => {
    it('closes every connection', async () => {
      const server = await createTestServer();
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const auth = await guestAuth(server.app);
      await request(server.app).post('/api/connections').set('Authorization', auth).send({ config: mysqlConfig });

      await server.sourcedesk.shutdown();

      expect(server.driver.connections[0].closed).toBe(true);
      expect(server.sourcedesk.registry.stats()).toEqual({ users: 0, connections: 0 });
      vi.restoreAllMocks();
    });
  });
});
