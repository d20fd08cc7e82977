/**
 * Type definitions for the SQL bridge
 */

export type DatabaseDriverName = 'mysql' | 'postgres';

/**
 * Credentials and address used for every database connection
 */
export interface ConnectionParams {
  host: string;
  user: string;
  password: string;
  database: string;
  port: number;
}

/**
 * Column metadata as reported by the database (no normalization)
 */
export interface ColumnDescriptor {
  name: string;
  type: string;
  nullable: boolean;
  key: string;
  default: string | null;
  extra: string;
}

export interface TableDescriptor {
  name: string;
  columns: ColumnDescriptor[];
}

/**
 * Snapshot of every visible table, in the database's native order
 */
export interface SchemaDescription {
  tables: TableDescriptor[];
}

export type Row = Record<string, unknown>;

/**
 * Result of a single statement: a row set for reads, an affected count for writes
 */
export type QueryOutcome =
  | { kind: 'rows'; rows: Row[] }
  | { kind: 'affected'; affectedRows: number };

export interface TableDetails {
  name: string;
  rowCount: number;
  columns: ColumnDescriptor[];
}

export interface TableSample {
  name: string;
  rows: Row[];
}

/**
 * Lookup of a named table. A missing table is a normal outcome carrying
 * the names that do exist.
 */
export type TableLookup<T> =
  | { found: true; value: T }
  | { found: false; tableName: string; availableTables: string[] };

export interface NaturalLanguageResult {
  sql: string;
  outcome: QueryOutcome;
}

/**
 * Structured form of an outcome for JSON transports
 */
export type StructuredOutcome = Row[] | { affected_rows: number };

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};
