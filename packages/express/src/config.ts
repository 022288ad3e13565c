/**
 * Server options from the environment.
 */

import { DEFAULT_SESSION_TTL_MS, InvalidConfigError, type ConfigIssue } from '@sourcedesk/core';

export interface ServerOptions {
  sessionSecret: string;
  sessionTtlMs: number;
  driverTimeoutMs?: number;
  /** Postgres URL for the config store; configs stay in memory without it */
  databaseUrl?: string;
  /** Mount path for every route (default: '') */
  prefix: string;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Read server options from environment variables:
 *
 * - `SESSION_SECRET` (required)
 * - `SESSION_TTL_MS` (default: 24h)
 * - `DRIVER_TIMEOUT_MS` (optional)
 * - `DATABASE_URL` (optional)
 * - `API_PREFIX` (default: '')
 *
 * @throws InvalidConfigError listing every bad variable
 */
export function resolveServerOptions(env: Env = process.env): ServerOptions {
  const issues: ConfigIssue[] = [];

  const sessionSecret = env.SESSION_SECRET ?? '';
  if (!sessionSecret) {
    issues.push({ path: 'SESSION_SECRET', message: 'is required' });
  }

  const sessionTtlMs = positiveInt(env, 'SESSION_TTL_MS', issues) ?? DEFAULT_SESSION_TTL_MS;
  const driverTimeoutMs = positiveInt(env, 'DRIVER_TIMEOUT_MS', issues);

  if (issues.length > 0) {
    throw new InvalidConfigError('Invalid server environment', issues);
  }

  return {
    sessionSecret,
    sessionTtlMs,
    ...(driverTimeoutMs !== undefined ? { driverTimeoutMs } : {}),
    ...(env.DATABASE_URL ? { databaseUrl: env.DATABASE_URL } : {}),
    prefix: env.API_PREFIX ?? '',
  };
}

function positiveInt(env: Env, name: string, issues: ConfigIssue[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    issues.push({ path: name, message: 'must be a positive integer' });
    return undefined;
  }
  return value;
}
