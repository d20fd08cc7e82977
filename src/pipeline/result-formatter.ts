/**
 * Result formatting for text and JSON transports
 *
 * Cell values are not escaped: a `|` or newline inside a value breaks the
 * table layout.
 */

import { formatNotFoundMessage } from '../errors.js';
import type {
  QueryOutcome,
  Row,
  StructuredOutcome,
  TableDetails,
  TableLookup,
  TableSample,
} from '../types/index.js';

export const NO_RESULTS_MESSAGE = 'Query executed successfully. No results returned.';

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Markdown table with columns in the key order of the first row
 */
export function formatRowsTable(rows: Row[]): string {
  if (rows.length === 0) return '';

  const headers = Object.keys(rows[0]);
  const lines = [
    '| ' + headers.join(' | ') + ' |',
    '|' + headers.map(header => '-'.repeat(Math.max(header.length, 3))).join('|') + '|',
    ...rows.map(row => '| ' + headers.map(header => formatCell(row[header])).join(' | ') + ' |'),
  ];

  return lines.join('\n') + '\n';
}

/**
 * Read the column names back out of a table produced by formatRowsTable()
 */
export function parseTableHeader(table: string): string[] {
  const [header = ''] = table.split('\n');
  return header
    .replace(/^\|\s?/, '')
    .replace(/\s?\|$/, '')
    .split(' | ');
}

export function formatOutcome(outcome: QueryOutcome): string {
  if (outcome.kind === 'affected') {
    return `Query executed successfully. ${outcome.affectedRows} rows affected.`;
  }

  if (outcome.rows.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  return `Query Results (${outcome.rows.length} rows):\n\n` + formatRowsTable(outcome.rows);
}

export function toStructuredData(outcome: QueryOutcome): StructuredOutcome {
  return outcome.kind === 'rows' ? outcome.rows : { affected_rows: outcome.affectedRows };
}

export function formatTableList(tables: string[]): string {
  if (tables.length === 0) {
    return 'No tables found in the database.';
  }

  return 'Tables in the database:\n\n' + tables.map((name, i) => `${i + 1}. ${name}\n`).join('');
}

export function formatTableDetails(details: TableDetails): string {
  let output = `Table: ${details.name}\nRows: ${details.rowCount}\n\nColumns:\n\n`;

  for (const col of details.columns) {
    output += `- ${col.name}: ${col.type}\n`;
    output += `  - Null: ${col.nullable ? 'YES' : 'NO'}\n`;
    output += `  - Key: ${col.key || 'None'}\n`;
    output += `  - Default: ${col.default || 'None'}\n`;
    output += `  - Extra: ${col.extra || 'None'}\n\n`;
  }

  return output;
}

export function formatSampleData(sample: TableSample): string {
  if (sample.rows.length === 0) {
    return `No data found in table '${sample.name}'.`;
  }

  return (
    `Sample data from ${sample.name} (showing ${sample.rows.length} rows):\n\n` +
    formatRowsTable(sample.rows)
  );
}

/**
 * Render a lookup, using the NotFound message when the table is missing
 */
export function formatLookup<T>(lookup: TableLookup<T>, render: (value: T) => string): string {
  if (!lookup.found) {
    return formatNotFoundMessage(lookup.tableName, lookup.availableTables);
  }
  return render(lookup.value);
}
