import type { DriverDefinition } from '@sourcedesk/core';
import { MysqlConnection, type MysqlConnectionOptions } from './connection';

/**
 * Driver definition for `database:mysql` sources.
 */
export function createMysqlDriver(options: MysqlConnectionOptions = {}): DriverDefinition {
  return {
    name: 'mysql',
    sourceType: { kind: 'database', database: 'mysql' },
    connect: (config, deps) => MysqlConnection.connect(config, deps, options),
  };
}

export const mysqlDriver: DriverDefinition = createMysqlDriver();
