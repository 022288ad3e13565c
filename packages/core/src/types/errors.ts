/**
 * Base error for all SourceDesk errors.
 */
export class SourceDeskError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'SourceDeskError';
  }
}

/**
 * No driver is registered for the requested source type.
 */
export class UnsupportedSourceError extends SourceDeskError {
  constructor(public readonly sourceKey: string) {
    super('UNSUPPORTED_SOURCE', `Unsupported source type "${sourceKey}"`);
    this.name = 'UnsupportedSourceError';
  }
}

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Connection configuration is malformed.
 */
export class InvalidConfigError extends SourceDeskError {
  constructor(
    message: string,
    public readonly issues: readonly ConfigIssue[] = []
  ) {
    super('INVALID_CONFIG', message);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Backend could not be reached or refused the connection.
 */
export class ConnectionError extends SourceDeskError {
  constructor(
    message: string,
    public readonly retryable = true,
    cause?: unknown
  ) {
    super('CONNECTION_FAILED', message, { cause });
    this.name = 'ConnectionError';
  }
}

/**
 * details / loadTables / tableExists failed at the backend.
 */
export class IntrospectionError extends SourceDeskError {
  constructor(
    public readonly operation: string,
    message: string,
    cause?: unknown
  ) {
    super('INTROSPECTION_FAILED', `${operation} failed: ${message}`, { cause });
    this.name = 'IntrospectionError';
  }
}

export class TableNotFoundError extends SourceDeskError {
  constructor(public readonly tableName: string) {
    super('TABLE_NOT_FOUND', `Table "${tableName}" not found`);
    this.name = 'TableNotFoundError';
  }
}

export class UserNotFoundError extends SourceDeskError {
  constructor(public readonly userId: string) {
    super('USER_NOT_FOUND', `User "${userId}" not found`);
    this.name = 'UserNotFoundError';
  }
}

/**
 * Session could not be minted.
 */
export class SessionError extends SourceDeskError {
  constructor(message: string) {
    super('SESSION_FAILED', message);
    this.name = 'SessionError';
  }
}

/**
 * A driver call did not settle within the allowed time.
 */
export class DriverTimeoutError extends SourceDeskError {
  constructor(public readonly timeoutMs: number) {
    super('DRIVER_TIMEOUT', `Driver call did not complete within ${timeoutMs}ms`);
    this.name = 'DriverTimeoutError';
  }
}

export class ConnectionClosedError extends SourceDeskError {
  constructor(public readonly connectionId: string) {
    super('CONNECTION_CLOSED', `Connection "${connectionId}" is closed`);
    this.name = 'ConnectionClosedError';
  }
}

export class DriverRegistrationError extends SourceDeskError {
  constructor(public readonly sourceKey: string) {
    super('DRIVER_CONFLICT', `A driver for "${sourceKey}" is already registered`);
    this.name = 'DriverRegistrationError';
  }
}

/**
 * Remote configuration store rejected a read or write.
 */
export class ConfigStoreError extends SourceDeskError {
  constructor(
    message: string,
    cause?: unknown
  ) {
    super('CONFIG_STORE_FAILED', message, { cause });
    this.name = 'ConfigStoreError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
