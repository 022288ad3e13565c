/**
 * Type-safe route definitions for the SourceDesk HTTP API.
 */

export const Routes = {
  // ── Session Routes ──────────────────────────────────────────────────
  /**
   * POST /api/auth/guest
   * Register a guest user for the request origin and mint a session.
   */
  GuestSession: '/api/auth/guest',

  /**
   * POST /api/auth/logout
   * Log the session's user out and close their connection.
   */
  Logout: '/api/auth/logout',

  // ── Connection Routes ───────────────────────────────────────────────
  /**
   * POST /api/connections
   * Open a connection for the session's user, replacing any previous one.
   */
  Connections: '/api/connections',

  /**
   * GET|DELETE /api/connections/current
   */
  CurrentConnection: '/api/connections/current',

  // ── Table Routes ────────────────────────────────────────────────────
  /**
   * GET /api/tables
   * List tables on the current connection.
   */
  Tables: '/api/tables',

  /**
   * GET /api/tables/:tableName
   */
  Table: '/api/tables/:tableName',

  /**
   * PUT /api/tables/:tableName/config
   */
  TableConfig: '/api/tables/:tableName/config',

  // ── Health Routes ───────────────────────────────────────────────────
  Health: '/health',
  Ready: '/ready',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Helper to build a route with parameters.
 *
 * @example
 * ```typescript
 * buildRoute(Routes.TableConfig, { tableName: 'orders' });
 * // => '/api/tables/orders/config'
 * ```
 */
export function buildRoute(route: RoutePath, params: Record<string, string> = {}): string {
  let result: string = route;
  for (const [key, value] of Object.entries(params)) {
    result = result.replace(`:${key}`, encodeURIComponent(value));
  }
  return result;
}

/**
 * Route configuration for enabling/disabling route groups.
 */
export interface RouteConfig {
  /** Guest session and logout */
  auth?: boolean;
  /** Open, inspect and close the user's connection */
  connections?: boolean;
  /** Table listing, lookup and config */
  tables?: boolean;
  health?: boolean;
}

export const DefaultRouteConfig: RouteConfig = {
  auth: true,
  connections: true,
  tables: true,
  health: true,
};
