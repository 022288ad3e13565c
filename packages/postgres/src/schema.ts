export const SCHEMA_VERSION = '0.1.0';

/** Minimal pg Pool interface */
export interface PgQueryable {
  query(sql: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export const schema = `
-- ============================================
-- SourceDesk Postgres Schema v${SCHEMA_VERSION}
-- ============================================

-- Per-table configs saved remotely by connections
CREATE TABLE IF NOT EXISTS sd_table_configs (
  connection_id   TEXT NOT NULL,
  table_name      TEXT NOT NULL,
  config          JSONB NOT NULL,
  updated_at      BIGINT NOT NULL,
  PRIMARY KEY (connection_id, table_name)
);

-- Connection configs saved by users (passwords are never stored)
CREATE TABLE IF NOT EXISTS sd_connection_configs (
  id              BIGSERIAL PRIMARY KEY,
  user_id         TEXT NOT NULL,
  config          JSONB NOT NULL,
  saved_at        BIGINT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sd_conn_configs_user ON sd_connection_configs(user_id, saved_at DESC);
`;

/**
 * Apply the full schema (idempotent)
 */
export async function applySchema(pool: PgQueryable): Promise<void> {
  await pool.query(schema);
}
