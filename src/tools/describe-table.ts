/**
 * Describe Table tool - Columns, keys, defaults and live row count of one table
 */

import { formatLookup, formatTableDetails, type QueryPipeline } from '../pipeline/index.js';
import type { ToolResult } from '../types/index.js';
import { errorResult, textResult } from './result.js';

interface DescribeTableToolInput {
  table_name: string;
}

export async function executeDescribeTableTool(
  pipeline: QueryPipeline,
  input: DescribeTableToolInput
): Promise<ToolResult> {
  try {
    const lookup = await pipeline.describeTable(input.table_name);
    return textResult(formatLookup(lookup, formatTableDetails));
  } catch (error) {
    return errorResult('describing table', error);
  }
}
