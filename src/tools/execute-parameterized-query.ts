/**
 * Execute Parameterized Query tool - Run a statement with driver-side placeholders
 */

import { formatOutcome, type QueryPipeline } from '../pipeline/index.js';
import type { ToolResult } from '../types/index.js';
import { errorResult, textResult } from './result.js';

interface ExecuteParameterizedQueryToolInput {
  query: string;
  params: Array<string | number | boolean | null>;
}

export async function executeParameterizedQueryTool(
  pipeline: QueryPipeline,
  input: ExecuteParameterizedQueryToolInput
): Promise<ToolResult> {
  try {
    const outcome = await pipeline.executeParameterized(input.query, input.params);
    return textResult(formatOutcome(outcome));
  } catch (error) {
    return errorResult('executing query', error);
  }
}
