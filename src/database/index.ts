export {
  withConnection,
  columnFromDescribeRow,
  type DatabaseConnection,
  type DatabaseDriver,
  type SqlDialect,
  type StatementResult,
} from './connection.js';
export { mysqlDriver } from './mysql.js';
export { postgresDriver } from './postgres.js';

import { mysqlDriver } from './mysql.js';
import { postgresDriver } from './postgres.js';
import type { DatabaseDriver } from './connection.js';
import type { DatabaseDriverName } from '../types/index.js';

export function getDriver(name: DatabaseDriverName): DatabaseDriver {
  return name === 'postgres' ? postgresDriver : mysqlDriver;
}
