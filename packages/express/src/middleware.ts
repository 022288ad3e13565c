/**
 * Express middleware for SourceDesk.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { InvalidConfigError, SessionError, SourceDeskError, type User } from '@sourcedesk/core';
import type { ServiceContainer } from './container';
import { ServiceTokens, type ServiceToken } from './tokens';

/**
 * Context attached to Express requests.
 */
export interface SourceDeskContext {
  container: ServiceContainer;
  /** Request origin; guest users are registered under it */
  origin: string;
  /** Set by the session middleware */
  user?: User;
  /** Request metadata */
  metadata: Record<string, unknown>;
}

declare global {
  namespace Express {
    interface Request {
      sourcedesk?: SourceDeskContext;
    }
  }
}

export interface ContextMiddlewareOptions {
  /** Extract the origin (default: req.ip) */
  getOrigin?: (req: Request) => string | undefined;
  /** Extract additional metadata */
  getMetadata?: (req: Request) => Record<string, unknown>;
}

/**
 * Create middleware that attaches SourceDesk context to requests.
 */
export function createContextMiddleware(
  container: ServiceContainer,
  options: ContextMiddlewareOptions = {}
): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.sourcedesk = {
      container,
      origin: options.getOrigin?.(req) ?? req.ip ?? req.socket.remoteAddress ?? 'unknown',
      metadata: options.getMetadata?.(req) ?? {},
    };
    next();
  };
}

/**
 * Create middleware that requires a Bearer session token mapping to an
 * active user. The user is attached to the request context.
 */
export function createSessionMiddleware(): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    requireSourceDeskContext(req);
    const { container } = req.sourcedesk;

    const header = req.headers.authorization ?? '';
    const [scheme, token] = header.split(' ');
    if (scheme !== 'Bearer' || !token) {
      throw new SessionError('Missing bearer token');
    }

    const claims = await container.resolve(ServiceTokens.SessionMinter).verify(token);
    if (!claims) {
      throw new SessionError('Invalid or expired session');
    }

    const user = container.resolve(ServiceTokens.Registry).findUser(claims.sub);
    if (!user || !user.hasSession(claims.jti)) {
      throw new SessionError('Session has been logged out');
    }

    req.sourcedesk.user = user;
    next();
  });
}

/**
 * Error response format.
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  INVALID_CONFIG: 400,
  UNSUPPORTED_SOURCE: 400,
  SESSION_FAILED: 401,
  TABLE_NOT_FOUND: 404,
  USER_NOT_FOUND: 404,
  CONNECTION_CLOSED: 409,
  CONNECTION_FAILED: 502,
  INTROSPECTION_FAILED: 502,
  CONFIG_STORE_FAILED: 502,
  DRIVER_TIMEOUT: 504,
};

/**
 * Map a SourceDeskError code to an HTTP status.
 */
export function statusForCode(code: string): number {
  return STATUS_BY_CODE[code] ?? 500;
}

/**
 * Create error handling middleware for SourceDesk routes.
 */
export function createErrorHandler(): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      console.error('[SourceDesk] Request failed:', err);
    }
    res.status(status).json(body);
  };
}

function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof SourceDeskError) {
    const details = err instanceof InvalidConfigError && err.issues.length > 0 ? err.issues : undefined;
    return {
      status: statusForCode(err.code),
      body: { error: { code: err.code, message: err.message, ...(details ? { details } : {}) } },
    };
  }

  // Body parser failures carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return { status: err.status, body: { error: { code: 'BAD_REQUEST', message: err.message } } };
  }

  const message = err instanceof Error && err.message ? err.message : 'An unexpected error occurred';
  return { status: 500, body: { error: { code: 'INTERNAL_ERROR', message } } };
}

/**
 * Request validation helpers.
 */
export function requireSourceDeskContext(
  req: Request
): asserts req is Request & { sourcedesk: SourceDeskContext } {
  if (!req.sourcedesk) {
    const err = new Error('SourceDesk context not attached. Did you forget the middleware?');
    err.name = 'ConfigurationError';
    throw err;
  }
}

export function requireUser(
  req: Request
): asserts req is Request & { sourcedesk: SourceDeskContext & { user: User } } {
  requireSourceDeskContext(req);
  if (!req.sourcedesk.user) {
    throw new SessionError('Session required');
  }
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Validate that required services are registered.
 */
export function validateServices(container: ServiceContainer, tokens: ServiceToken<unknown>[]): void {
  const missing = tokens.filter(token => !container.has(token));
  if (missing.length > 0) {
    throw new Error(`Missing required services: ${missing.map(t => String(t.key)).join(', ')}`);
  }
}
