// Schema
export { schema, SCHEMA_VERSION, applySchema, type PgQueryable } from './schema';

// Pool
export { createPgPool } from './pool';

// Stores
export { PgConfigStore } from './config-store';
