import { createPool, type PoolOptions, type RowDataPacket } from 'mysql2/promise';

export type MysqlRow = Record<string, unknown>;

/**
 * Minimal query surface the driver needs (avoids handing the pool around).
 */
export interface MysqlExecutor {
  query(sql: string, values?: unknown[]): Promise<MysqlRow[]>;
  end(): Promise<void>;
}

export type MysqlExecutorFactory = (options: PoolOptions) => MysqlExecutor;

/**
 * Executor backed by a mysql2 pool.
 */
export const createMysqlExecutor: MysqlExecutorFactory = options => {
  const pool = createPool(options);
  return {
    async query(sql, values = []) {
      const [rows] = await pool.query<RowDataPacket[]>(sql, values);
      return rows;
    },
    end: () => pool.end(),
  };
};
