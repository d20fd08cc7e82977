/**
 * PostgreSQL driver (pg)
 *
 * Each connection opens a transaction so that writes are only kept once
 * commit() is called; a connection closed without commit rolls back.
 */

import pg from 'pg';
import {
  columnFromDescribeRow,
  type DatabaseConnection,
  type DatabaseDriver,
  type SqlDialect,
  type StatementResult,
} from './connection.js';
import { DatabaseError } from '../errors.js';
import type { ConnectionParams, Row } from '../types/index.js';

const { Client } = pg;

class PostgresConnection implements DatabaseConnection {
  private inTransaction = false;

  constructor(private readonly client: pg.Client) {}

  async begin(): Promise<void> {
    await this.client.query('BEGIN');
    this.inTransaction = true;
  }

  async execute(sql: string, params?: unknown[]): Promise<StatementResult> {
    // A string holding several statements yields one result per statement
    const result: pg.QueryResult<Row> | pg.QueryResult<Row>[] = await this.client.query<Row>(sql, params);
    if (Array.isArray(result)) {
      throw new DatabaseError('Multiple statements are not supported');
    }
    const rows = result.rows;
    return {
      rows,
      rowCount: result.command === 'SELECT' ? rows.length : result.rowCount ?? 0,
    };
  }

  async commit(): Promise<void> {
    await this.client.query('COMMIT');
    this.inTransaction = false;
  }

  async close(): Promise<void> {
    try {
      if (this.inTransaction) {
        await this.client.query('ROLLBACK');
      }
    } finally {
      await this.client.end();
    }
  }
}

// Columns aliased to the MySQL DESCRIBE shape so both dialects share one mapper
const DESCRIBE_TABLE_SQL = `
  SELECT
    c.column_name AS "Field",
    CASE
      WHEN c.character_maximum_length IS NOT NULL
        THEN c.data_type || '(' || c.character_maximum_length || ')'
      ELSE c.data_type
    END AS "Type",
    c.is_nullable AS "Null",
    CASE WHEN pk.column_name IS NOT NULL THEN 'PRI' ELSE '' END AS "Key",
    c.column_default AS "Default",
    CASE
      WHEN c.is_identity = 'YES' OR c.column_default LIKE 'nextval(%' THEN 'auto_increment'
      ELSE ''
    END AS "Extra"
  FROM information_schema.columns c
  LEFT JOIN (
    SELECT kcu.column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON tc.constraint_name = kcu.constraint_name
      AND tc.table_schema = kcu.table_schema
      AND tc.table_name = kcu.table_name
    WHERE tc.constraint_type = 'PRIMARY KEY'
      AND tc.table_schema = current_schema()
      AND tc.table_name = $1
  ) pk ON pk.column_name = c.column_name
  WHERE c.table_schema = current_schema()
    AND c.table_name = $1
  ORDER BY c.ordinal_position
`;

export const postgresDialect: SqlDialect = {
  async listTables(connection) {
    const { rows } = await connection.execute(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = current_schema()
        AND table_type = 'BASE TABLE'
    `);
    return rows.map(row => String(row.table_name));
  },

  async describeTable(connection, tableName) {
    const { rows } = await connection.execute(DESCRIBE_TABLE_SQL, [tableName]);
    return rows.map(columnFromDescribeRow);
  },

  quoteIdentifier(name) {
    return '"' + name.replace(/"/g, '""') + '"';
  },
};

export const postgresDriver: DatabaseDriver = {
  name: 'postgres',
  dialect: postgresDialect,

  async connect(params: ConnectionParams): Promise<DatabaseConnection> {
    const client = new Client({
      host: params.host,
      user: params.user,
      password: params.password,
      database: params.database,
      port: params.port,
    });
    await client.connect();

    const connection = new PostgresConnection(client);
    try {
      await connection.begin();
    } catch (error) {
      await client.end();
      throw error;
    }
    return connection;
  },
};
