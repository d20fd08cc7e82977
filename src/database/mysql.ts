/**
 * MySQL driver (mysql2)
 */

import mysql from 'mysql2/promise';
import type { Connection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import {
  columnFromDescribeRow,
  type DatabaseConnection,
  type DatabaseDriver,
  type SqlDialect,
  type StatementResult,
} from './connection.js';
import type { ConnectionParams } from '../types/index.js';

class MySQLConnection implements DatabaseConnection {
  constructor(private readonly connection: Connection) {}

  async execute(sql: string, params?: unknown[]): Promise<StatementResult> {
    const [result] =
      params && params.length > 0
        ? await this.connection.query<RowDataPacket[] | ResultSetHeader>(sql, params)
        : await this.connection.query<RowDataPacket[] | ResultSetHeader>(sql);

    if (Array.isArray(result)) {
      return { rows: result, rowCount: result.length };
    }
    return { rows: [], rowCount: result.affectedRows };
  }

  async commit(): Promise<void> {
    await this.connection.commit();
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}

export const mysqlDialect: SqlDialect = {
  async listTables(connection) {
    const { rows } = await connection.execute('SHOW TABLES');
    // Single column named `Tables_in_<database>`
    return rows.map(row => String(Object.values(row)[0]));
  },

  async describeTable(connection, tableName) {
    const { rows } = await connection.execute(`DESCRIBE ${mysqlDialect.quoteIdentifier(tableName)}`);
    return rows.map(columnFromDescribeRow);
  },

  quoteIdentifier(name) {
    return '`' + name.replace(/`/g, '``') + '`';
  },
};

export const mysqlDriver: DatabaseDriver = {
  name: 'mysql',
  dialect: mysqlDialect,

  async connect(params: ConnectionParams): Promise<DatabaseConnection> {
    const connection = await mysql.createConnection({
      host: params.host,
      user: params.user,
      password: params.password,
      database: params.database,
      port: params.port,
      // BIGINT and DECIMAL values arrive as strings instead of rounded numbers
      supportBigNumbers: true,
      bigNumberStrings: true,
    });
    return new MySQLConnection(connection);
  },
};
