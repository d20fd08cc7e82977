/**
 * Tool executor re-exports
 *
 * Each tool's sole public API is its execute function.
 * Registration (name, schema, description) is handled in mcp-server.ts via the MCP SDK.
 */

export { executeSqlQueryTool } from './execute-sql-query.js';
export { executeParameterizedQueryTool } from './execute-parameterized-query.js';
export { executeNaturalLanguageQueryTool } from './natural-language-query.js';
export { executeListTablesTool } from './list-tables.js';
export { executeDescribeTableTool } from './describe-table.js';
export { executeGetTableDataTool } from './get-table-data.js';
export { textResult, errorResult } from './result.js';
