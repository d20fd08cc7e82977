/**
 * Query executor
 *
 * Runs one statement as given. There is no statement splitting and no
 * escaping: SQL injection through the literal and natural-language paths is
 * an accepted property. runParameterized() is the placeholder-based variant.
 */

import { withConnection, type DatabaseDriver } from '../database/index.js';
import type { Logger } from '../utils/logger.js';
import type { ConnectionParams, QueryOutcome } from '../types/index.js';

/**
 * Lexical read/write classification: a read iff the trimmed text starts with SELECT.
 * `WITH ... SELECT` and `SHOW` statements therefore count as writes.
 */
export function isReadStatement(sql: string): boolean {
  return sql.trim().toUpperCase().startsWith('SELECT');
}

export class QueryExecutor {
  constructor(
    private readonly driver: DatabaseDriver,
    private readonly params: ConnectionParams,
    private readonly logger: Logger
  ) {}

  async run(sql: string): Promise<QueryOutcome> {
    return this.execute(sql);
  }

  async runParameterized(sql: string, values: unknown[]): Promise<QueryOutcome> {
    return this.execute(sql, values);
  }

  private async execute(sql: string, values?: unknown[]): Promise<QueryOutcome> {
    const read = isReadStatement(sql);
    this.logger.info('Executing query', { sql, read });

    return withConnection<QueryOutcome>(this.driver, this.params, this.logger, async connection => {
      const result = await connection.execute(sql, values);

      if (read) {
        return { kind: 'rows', rows: result.rows };
      }

      await connection.commit();
      return { kind: 'affected', affectedRows: result.rowCount };
    });
  }
}
