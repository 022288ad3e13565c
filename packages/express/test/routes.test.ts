/**
 * Tests for route utilities.
 */

import { describe, it, expect } from 'vitest';
import { Routes, buildRoute, DefaultRouteConfig } from '../src/routes';

describe('Routes', () => {
  describe('Route constants', () => {
    it('has health routes', () => {
      expect(Routes.Health).toBe('/health');
      expect(Routes.Ready).toBe('/ready');
    });

    it('has session routes', () => {
      expect(Routes.GuestSession).toBe('/api/auth/guest');
      expect(Routes.Logout).toBe('/api/auth/logout');
    });

    it('has connection and table routes', () => {
      expect(Routes.Connections).toBe('/api/connections');
      expect(Routes.CurrentConnection).toBe('/api/connections/current');
      expect(Routes.Table).toBe('/api/tables/:tableName');
      expect(Routes.TableConfig).toBe('/api/tables/:tableName/config');
    });
  });

  describe('buildRoute', () => {
    it('builds route with a parameter', () => {
      expect(buildRoute(Routes.TableConfig, { tableName: 'orders' })).toBe('/api/tables/orders/config');
    });

    it('encodes parameter values', () => {
      expect(buildRoute(Routes.Table, { tableName: 'order items' })).toBe('/api/tables/order%20items');
    });

    it('returns route unchanged if no params needed', () => {
      expect(buildRoute(Routes.Health)).toBe('/health');
    });

    it('leaves missing params in place', () => {
      expect(buildRoute(Routes.Table, {})).toBe('/api/tables/:tableName');
    });
  });

  describe('DefaultRouteConfig', () => {
    it('has all routes enabled by default', () => {
      expect(DefaultRouteConfig).toEqual({ auth: true, connections: true, tables: true, health: true });
    });
  });
});
