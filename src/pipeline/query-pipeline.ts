/**
 * Query pipeline shared by the MCP and HTTP shells
 *
 * Natural language: introspect schema → build prompt → ask the model →
 * clean the completion → execute. Literal SQL goes straight to the executor.
 */

import { withConnection, type DatabaseDriver } from '../database/index.js';
import { DatabaseError, TranslationAmbiguousError } from '../errors.js';
import type { Config } from '../config.js';
import type { Logger } from '../utils/logger.js';
import type {
  ConnectionParams,
  NaturalLanguageResult,
  QueryOutcome,
  SchemaDescription,
  TableDetails,
  TableLookup,
  TableSample,
} from '../types/index.js';
import { SchemaIntrospector, renderSchemaText } from './schema-introspector.js';
import { buildSqlPrompt } from './prompt-builder.js';
import { OllamaClient, cleanSqlResponse } from './model-client.js';
import { QueryExecutor } from './query-executor.js';

export const DEFAULT_SAMPLE_LIMIT = 10;

export interface PipelineDependencies {
  driver: DatabaseDriver;
  params: ConnectionParams;
  modelClient: OllamaClient;
  logger: Logger;
}

export class QueryPipeline {
  readonly introspector: SchemaIntrospector;
  readonly executor: QueryExecutor;
  private readonly driver: DatabaseDriver;
  private readonly params: ConnectionParams;
  private readonly modelClient: OllamaClient;
  private readonly logger: Logger;

  constructor(deps: PipelineDependencies) {
    this.driver = deps.driver;
    this.params = deps.params;
    this.modelClient = deps.modelClient;
    this.logger = deps.logger;
    this.introspector = new SchemaIntrospector(deps.driver, deps.params, deps.logger);
    this.executor = new QueryExecutor(deps.driver, deps.params, deps.logger);
  }

  async executeSql(sql: string): Promise<QueryOutcome> {
    return this.executor.run(sql);
  }

  async executeParameterized(sql: string, values: unknown[]): Promise<QueryOutcome> {
    return this.executor.runParameterized(sql, values);
  }

  /**
   * Translate a natural-language request into a SQL statement.
   * A connection failure during introspection aborts the translation.
   */
  async translate(naturalQuery: string): Promise<string> {
    const schema = await this.introspector.introspect();
    const prompt = buildSqlPrompt(renderSchemaText(schema), naturalQuery);
    const completion = await this.modelClient.generate(prompt);
    const sql = cleanSqlResponse(completion);

    this.logger.info('Translated natural language query', { naturalQuery, sql });
    return sql;
  }

  async naturalLanguageQuery(naturalQuery: string): Promise<NaturalLanguageResult> {
    const sql = await this.translate(naturalQuery);

    try {
      const outcome = await this.executor.run(sql);
      return { sql, outcome };
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw new TranslationAmbiguousError(sql, error);
      }
      throw error;
    }
  }

  async getSchema(): Promise<SchemaDescription> {
    return this.introspector.introspect();
  }

  async schemaDocument(): Promise<string> {
    return this.introspector.describeDocument();
  }

  async listTables(): Promise<string[]> {
    return this.introspector.listTableNames();
  }

  /**
   * Columns and live row count of one table. A missing table is reported
   * without running any statement against it.
   */
  async describeTable(tableName: string): Promise<TableLookup<TableDetails>> {
    const { dialect } = this.driver;

    return withConnection<TableLookup<TableDetails>>(this.driver, this.params, this.logger, async connection => {
      const tables = await dialect.listTables(connection);
      if (!tables.includes(tableName)) {
        return { found: false, tableName, availableTables: tables };
      }

      const columns = await dialect.describeTable(connection, tableName);
      const { rows } = await connection.execute(
        `SELECT COUNT(*) AS count FROM ${dialect.quoteIdentifier(tableName)}`
      );

      return {
        found: true,
        value: { name: tableName, rowCount: Number(rows[0]?.count ?? 0), columns },
      };
    });
  }

  async getTableData(
    tableName: string,
    limit: number = DEFAULT_SAMPLE_LIMIT
  ): Promise<TableLookup<TableSample>> {
    const { dialect } = this.driver;

    return withConnection<TableLookup<TableSample>>(this.driver, this.params, this.logger, async connection => {
      const tables = await dialect.listTables(connection);
      if (!tables.includes(tableName)) {
        return { found: false, tableName, availableTables: tables };
      }

      const { rows } = await connection.execute(
        `SELECT * FROM ${dialect.quoteIdentifier(tableName)} LIMIT ${Math.trunc(limit)}`
      );
      return { found: true, value: { name: tableName, rows } };
    });
  }

  /**
   * Open a fresh connection and run a trivial statement
   */
  async checkConnection(): Promise<void> {
    await withConnection(this.driver, this.params, this.logger, connection => connection.execute('SELECT 1'));
  }

  get modelName(): string {
    return this.modelClient.model;
  }
}

/**
 * Wire a pipeline from configuration
 */
export function createPipeline(
  config: Config,
  driver: DatabaseDriver,
  logger: Logger,
  modelClient: OllamaClient = new OllamaClient(
    { baseUrl: config.ollamaUrl, model: config.ollamaModel },
    logger
  )
): QueryPipeline {
  return new QueryPipeline({ driver, params: config.database, modelClient, logger });
}
