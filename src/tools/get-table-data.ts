/**
 * Get Table Data tool - Return sample rows from a table
 */

import {
  DEFAULT_SAMPLE_LIMIT,
  formatLookup,
  formatSampleData,
  type QueryPipeline,
} from '../pipeline/index.js';
import type { ToolResult } from '../types/index.js';
import { errorResult, textResult } from './result.js';

interface GetTableDataToolInput {
  table_name: string;
  limit?: number;
}

export async function executeGetTableDataTool(
  pipeline: QueryPipeline,
  input: GetTableDataToolInput
): Promise<ToolResult> {
  try {
    const lookup = await pipeline.getTableData(input.table_name, input.limit ?? DEFAULT_SAMPLE_LIMIT);
    return textResult(formatLookup(lookup, formatSampleData));
  } catch (error) {
    return errorResult('getting table data', error);
  }
}
