export { MysqlConnection, type MysqlConnectionOptions } from './connection';
export { createMysqlDriver, mysqlDriver } from './driver';
export {
  createMysqlExecutor,
  type MysqlExecutor,
  type MysqlExecutorFactory,
  type MysqlRow,
} from './executor';
export { DEFAULT_MYSQL_PORT } from './queries';
