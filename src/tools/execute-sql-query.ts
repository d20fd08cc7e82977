/**
 * Execute SQL Query tool - Run one literal SQL statement
 */

import { formatOutcome, type QueryPipeline } from '../pipeline/index.js';
import type { ToolResult } from '../types/index.js';
import { errorResult, textResult } from './result.js';

interface ExecuteSqlQueryToolInput {
  query: string;
}

export async function executeSqlQueryTool(
  pipeline: QueryPipeline,
  input: ExecuteSqlQueryToolInput
): Promise<ToolResult> {
  try {
    const outcome = await pipeline.executeSql(input.query);
    return textResult(formatOutcome(outcome));
  } catch (error) {
    return errorResult('executing query', error);
  }
}
