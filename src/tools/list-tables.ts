/**
 * List Tables tool - List all tables in the database
 */

import { formatTableList, type QueryPipeline } from '../pipeline/index.js';
import type { ToolResult } from '../types/index.js';
import { errorResult, textResult } from './result.js';

export async function executeListTablesTool(pipeline: QueryPipeline): Promise<ToolResult> {
  try {
    const tables = await pipeline.listTables();
    return textResult(formatTableList(tables));
  } catch (error) {
    return errorResult('listing tables', error);
  }
}
