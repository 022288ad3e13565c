/**
 * @sourcedesk/express - HTTP transport for the SourceDesk service registry.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { SourceDeskExpress, resolveServerOptions } from '@sourcedesk/express';
 *
 * const options = resolveServerOptions();
 * const app = express();
 * app.use(express.json());
 *
 * await SourceDeskExpress.builder()
 *   .app(app)
 *   .sessionSecret(options.sessionSecret, options.sessionTtlMs)
 *   .prefix(options.prefix)
 *   .build();
 *
 * // POST   /api/auth/guest
 * // POST   /api/auth/logout
 * // POST   /api/connections
 * // GET    /api/connections/current
 * // DELETE /api/connections/current
 * // GET    /api/tables
 * // GET    /api/tables/:tableName
 * // PUT    /api/tables/:tableName/config
 * // GET    /health
 * // GET    /ready
 *
 * app.listen(3000);
 * ```
 */

// Main class
export { SourceDeskExpress, SourceDeskExpressBuilder } from './sourcedesk-express';
export type { SourceDeskExpressConfig } from './sourcedesk-express';

// Configuration
export { resolveServerOptions, type ServerOptions } from './config';

// Service container
export { ServiceContainer, type ServiceFactory } from './container';
export { ServiceTokens, serviceToken, type ServiceToken } from './tokens';

// Routes
export { Routes, buildRoute, DefaultRouteConfig } from './routes';
export type { RouteName, RoutePath, RouteConfig } from './routes';

// Middleware
export {
  createContextMiddleware,
  createSessionMiddleware,
  createErrorHandler,
  statusForCode,
  asyncHandler,
  requireSourceDeskContext,
  requireUser,
  validateServices,
} from './middleware';
export type { SourceDeskContext, ContextMiddlewareOptions, ErrorResponse } from './middleware';

// Route handlers (for custom routing)
export {
  registerAuthRoutes,
  registerConnectionRoutes,
  registerTableRoutes,
  registerHealthRoutes,
} from './handlers';
