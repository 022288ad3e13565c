import { Pool, type PoolConfig } from 'pg';

/**
 * Create the pg pool for the config store. Errors on idle clients are
 * logged; the pool replaces the client on its next checkout.
 */
export function createPgPool(config: PoolConfig): Pool {
  const pool = new Pool(config);
  pool.on('error', err => {
    console.error('[PgConfigStore] Idle client error:', err.message);
  });
  return pool;
}
