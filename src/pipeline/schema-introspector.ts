/**
 * Schema introspection
 * Reads tables and columns from the live database on every call; nothing is cached.
 */

import { withConnection, type DatabaseDriver } from '../database/index.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type {
  ColumnDescriptor,
  ConnectionParams,
  SchemaDescription,
  TableDescriptor,
} from '../types/index.js';

export const SCHEMA_DOCUMENT_HEADER = 'Database Schema:\n\n';

export class SchemaIntrospector {
  constructor(
    private readonly driver: DatabaseDriver,
    private readonly params: ConnectionParams,
    private readonly logger: Logger
  ) {}

  /**
   * Every visible table with its columns, in the order the database reports them
   */
  async introspect(): Promise<SchemaDescription> {
    const { dialect } = this.driver;

    return withConnection(this.driver, this.params, this.logger, async connection => {
      const names = await dialect.listTables(connection);
      const tables: TableDescriptor[] = [];
      for (const name of names) {
        const columns = await dialect.describeTable(connection, name);
        tables.push({ name, columns });
      }
      this.logger.debug('Schema introspected', { tables: tables.length });
      return { tables };
    });
  }

  async listTableNames(): Promise<string[]> {
    return withConnection(this.driver, this.params, this.logger, connection =>
      this.driver.dialect.listTables(connection)
    );
  }

  /**
   * Schema rendered for documentation. Failures are reported in the text
   * instead of being thrown.
   */
  async describeDocument(): Promise<string> {
    try {
      const schema = await this.introspect();
      return SCHEMA_DOCUMENT_HEADER + renderSchemaText(schema);
    } catch (error) {
      this.logger.error('Error getting database schema', { error: errorMessage(error) });
      return `Error getting schema: ${errorMessage(error)}`;
    }
  }
}

function renderColumn(column: ColumnDescriptor): string {
  let line = `  - ${column.name}: ${column.type} ${column.nullable ? 'NULL' : 'NOT NULL'}`;
  if (column.key) line += ` ${column.key}`;
  if (column.default) line += ` DEFAULT ${column.default}`;
  return line;
}

/**
 * Flatten a schema description to the plain text embedded in model prompts.
 * An empty schema renders as the empty string.
 */
export function renderSchemaText(schema: SchemaDescription): string {
  return schema.tables
    .map(table => [`Table: ${table.name}`, ...table.columns.map(renderColumn), ''].join('\n') + '\n')
    .join('');
}
