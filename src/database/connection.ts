/**
 * Database collaborator contract
 *
 * Every operation opens its own connection and closes it before returning;
 * nothing is pooled or shared between requests.
 */

import { ConnectionError, DatabaseError, errorMessage } from '../errors.js';
import type { ColumnDescriptor, ConnectionParams, DatabaseDriverName, Row } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface StatementResult {
  rows: Row[];
  /** Rows returned for reads, rows changed for writes */
  rowCount: number;
}

export interface DatabaseConnection {
  execute(sql: string, params?: unknown[]): Promise<StatementResult>;
  commit(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Dialect-specific introspection built on a connection
 */
export interface SqlDialect {
  listTables(connection: DatabaseConnection): Promise<string[]>;
  describeTable(connection: DatabaseConnection, tableName: string): Promise<ColumnDescriptor[]>;
  quoteIdentifier(name: string): string;
}

export interface DatabaseDriver {
  readonly name: DatabaseDriverName;
  readonly dialect: SqlDialect;
  connect(params: ConnectionParams): Promise<DatabaseConnection>;
}

/**
 * Open a connection, run `work`, and close the connection on every exit path.
 * Connect failures become ConnectionError; failures inside `work` that are not
 * already classified become DatabaseError. A failing close is logged and never
 * replaces the result or error of `work`.
 */
export async function withConnection<T>(
  driver: DatabaseDriver,
  params: ConnectionParams,
  logger: Logger,
  work: (connection: DatabaseConnection) => Promise<T>
): Promise<T> {
  let connection: DatabaseConnection;
  try {
    connection = await driver.connect(params);
  } catch (error) {
    throw new ConnectionError(`Database connection error: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return await work(connection);
  } catch (error) {
    if (error instanceof DatabaseError || error instanceof ConnectionError) {
      throw error;
    }
    throw new DatabaseError(errorMessage(error), { cause: error });
  } finally {
    await connection.close().catch((error: unknown) => {
      logger.warn('Error closing database connection', { error: errorMessage(error) });
    });
  }
}

function textOrEmpty(value: unknown): string {
  if (value === null || value === undefined) return '';
  return Buffer.isBuffer(value) ? value.toString('utf8') : String(value);
}

/**
 * Map a `DESCRIBE`-shaped row (Field, Type, Null, Key, Default, Extra)
 * to a column descriptor, keeping the reported values as they are
 */
export function columnFromDescribeRow(row: Row): ColumnDescriptor {
  const defaultValue = row.Default;
  return {
    name: textOrEmpty(row.Field),
    type: textOrEmpty(row.Type),
    nullable: textOrEmpty(row.Null).toUpperCase() === 'YES',
    key: textOrEmpty(row.Key),
    default: defaultValue === null || defaultValue === undefined ? null : textOrEmpty(defaultValue),
    extra: textOrEmpty(row.Extra),
  };
}
