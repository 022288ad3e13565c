/**
 * Source types and connection configuration.
 *
 * The source-type tag on a ConnectionConfig is fixed at construction and is
 * the only thing the registry looks at when picking a driver.
 */

export const DATABASE_VARIANTS = ['mysql', 'postgres', 'mssql', 'sqlite', 'mongodb'] as const;
export type DatabaseVariant = (typeof DATABASE_VARIANTS)[number];

export const FILE_FORMATS = ['csv', 'json', 'xlsx'] as const;
export type FileFormat = (typeof FILE_FORMATS)[number];

export const API_PROTOCOLS = ['rest', 'graphql'] as const;
export type ApiProtocol = (typeof API_PROTOCOLS)[number];

export type SourceType =
  | { readonly kind: 'database'; readonly database: DatabaseVariant }
  | { readonly kind: 'file'; readonly format: FileFormat }
  | { readonly kind: 'api'; readonly protocol: ApiProtocol };

export type SourceKind = SourceType['kind'];

/**
 * How to reach a data source.
 */
export interface ConnectionConfig {
  readonly sourceType: SourceType;
  readonly host?: string;
  readonly port?: number;
  readonly username?: string;
  readonly password?: string;
  readonly database?: string;
  /** Stable identity used as the remote-store key. Generated when absent. */
  readonly connectionId?: string;
  /** Backend-specific extras */
  readonly options?: Readonly<Record<string, unknown>>;
}

/**
 * Canonical dispatch key for a source type, e.g. `database:mysql`.
 */
export function sourceTypeKey(sourceType: SourceType): string {
  switch (sourceType.kind) {
    case 'database':
      return `database:${sourceType.database}`;
    case 'file':
      return `file:${sourceType.format}`;
    case 'api':
      return `api:${sourceType.protocol}`;
  }
}

/**
 * Shorthand for a database source type.
 */
export function databaseSource(database: DatabaseVariant): SourceType {
  return { kind: 'database', database };
}

/**
 * Copy of the config without credentials. Use before a config leaves the process.
 */
export function redactConfig(config: ConnectionConfig): ConnectionConfig {
  const { password: _password, ...rest } = config;
  return rest;
}
