/**
 * Natural Language Query tool - Translate a request to SQL with Ollama, then run it
 */

import { formatOutcome, type QueryPipeline } from '../pipeline/index.js';
import type { ToolResult } from '../types/index.js';
import { errorResult, textResult } from './result.js';

interface NaturalLanguageQueryToolInput {
  natural_query: string;
}

export async function executeNaturalLanguageQueryTool(
  pipeline: QueryPipeline,
  input: NaturalLanguageQueryToolInput
): Promise<ToolResult> {
  try {
    const { sql, outcome } = await pipeline.naturalLanguageQuery(input.natural_query);
    return textResult(`Generated SQL: ${sql}\n\n${formatOutcome(outcome)}`);
  } catch (error) {
    return errorResult('processing natural language query', error);
  }
}
