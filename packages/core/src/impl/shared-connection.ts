/**
 * SharedConnection: exclusive-access handle around one driver instance.
 *
 * Every call takes the handle's mutex for its whole duration, so two
 * requests on the same connection never interleave. Handles for different
 * users have separate mutexes and never wait on each other.
 */

import type { Connection, ConnectionDetails } from '../interfaces/connection';
import type { SourceType } from '../types/source';
import type { TableConfig, TableSummary } from '../types/table';
import { ConnectionClosedError, DriverTimeoutError } from '../types/errors';
import { Mutex } from './mutex';

export interface CallOptions {
  /** Reject the caller after this long. The lock is kept until the driver call settles. */
  timeoutMs?: number;
}

export interface SharedConnectionOptions {
  /** Default timeout for every call on this handle */
  timeoutMs?: number;
}

export class SharedConnection {
  private readonly mutex = new Mutex();
  private closed = false;

  constructor(
    private readonly connection: Connection,
    private readonly options: SharedConnectionOptions = {}
  ) {}

  get connectionId(): string {
    return this.connection.connectionId;
  }

  get sourceType(): SourceType {
    return this.connection.sourceType;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isLocked(): boolean {
    return this.mutex.isLocked;
  }

  /** Calls queued behind the current holder */
  get pending(): number {
    return this.mutex.pending;
  }

  /**
   * Run fn with exclusive access to the driver. The lock is released when
   * fn settles, whether it resolves or rejects.
   *
   * @throws ConnectionClosedError if the handle was closed
   * @throws DriverTimeoutError if the call outlives the timeout
   */
  async withConnection<T>(fn: (conn: Connection) => Promise<T>, options: CallOptions = {}): Promise<T> {
    const release = await this.mutex.acquire();

    if (this.closed) {
      release();
      throw new ConnectionClosedError(this.connectionId);
    }

    const work = Promise.resolve().then(() => fn(this.connection));
    void work.then(release, release);

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    return timeoutMs === undefined ? work : withTimeout(work, timeoutMs);
  }

  details(options?: CallOptions): Promise<ConnectionDetails> {
    return this.withConnection(conn => conn.details(), options);
  }

  loadTables(options?: CallOptions): Promise<TableSummary[]> {
    return this.withConnection(conn => conn.loadTables(), options);
  }

  tableExists(name: string, options?: CallOptions): Promise<boolean> {
    return this.withConnection(conn => conn.tableExists(name), options);
  }

  saveTableConfig(
    tableName: string,
    config: TableConfig,
    saveLocal: boolean,
    options?: CallOptions
  ): Promise<void> {
    return this.withConnection(conn => conn.saveTableConfig(tableName, config, saveLocal), options);
  }

  /**
   * Close the driver once every queued call has finished. With a handle
   * timeout, the driver is closed without the lock once that long has
   * passed. Later calls reject with ConnectionClosedError.
   */
  async close(): Promise<void> {
    if (this.closed) return;

    const release = await this.acquireForClose();
    try {
      if (this.closed) return;
      this.closed = true;
      await this.connection.close();
    } finally {
      release?.();
    }
  }

  /**
   * Resolves with the lock, or with undefined once the handle timeout
   * expires. A lock granted after that is released straight away.
   */
  private acquireForClose(): Promise<(() => void) | undefined> {
    const acquiring = this.mutex.acquire();
    const timeoutMs = this.options.timeoutMs;
    if (timeoutMs === undefined) return acquiring;

    return new Promise(resolve => {
      const timer = setTimeout(() => {
        console.warn(`[SharedConnection] Closing ${this.connectionId} without the lock after ${timeoutMs}ms`);
        void acquiring.then(release => release());
        resolve(undefined);
      }, timeoutMs);

      void acquiring.then(release => {
        clearTimeout(timer);
        resolve(release);
      });
    });
  }
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new DriverTimeoutError(timeoutMs)), timeoutMs);
    work.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
