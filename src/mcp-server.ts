/**
 * MCP shell: tools, resources and prompts over the query pipeline
 */

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import {
  buildAnalysisTaskPrompt,
  buildQueryAssistantPrompt,
  DEFAULT_SAMPLE_LIMIT,
  type QueryPipeline,
} from './pipeline/index.js';
import {
  executeSqlQueryTool,
  executeParameterizedQueryTool,
  executeNaturalLanguageQueryTool,
  executeListTablesTool,
  executeDescribeTableTool,
  executeGetTableDataTool,
} from './tools/index.js';
import type { Logger } from './utils/logger.js';

export const SERVER_NAME = 'sql-bridge';
export const SERVER_VERSION = '1.0.0';

const RESOURCE_SAMPLE_LIMIT = 5;

function templateVariable(variables: Record<string, string | string[]>, name: string): string {
  const value = variables[name];
  return Array.isArray(value) ? value[0] ?? '' : value;
}

function textResource(uri: URL, text: string) {
  return {
    contents: [{ uri: uri.href, mimeType: 'text/plain', text }],
  };
}

function userPrompt(text: string) {
  return {
    messages: [{ role: 'user' as const, content: { type: 'text' as const, text } }],
  };
}

/**
 * Create the MCP server with every tool, resource and prompt registered
 */
export function createMcpServer(pipeline: QueryPipeline): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  // === Tools ===

  server.tool(
    'execute_sql_query',
    'Execute a SQL query and return the results. SELECT statements return rows; anything else is committed and reports the affected row count.',
    {
      query: z.string().min(1).describe('The SQL query to execute (SELECT, INSERT, UPDATE, DELETE, etc.)'),
    },
    async ({ query }) => {
      return executeSqlQueryTool(pipeline, { query });
    }
  );

  server.tool(
    'natural_language_query',
    'Convert natural language to SQL using the configured Ollama model and execute the query.',
    {
      natural_query: z.string().min(1).describe('A natural language description of the query you want to execute'),
    },
    async ({ natural_query }) => {
      return executeNaturalLanguageQueryTool(pipeline, { natural_query });
    }
  );

  server.tool('list_tables', 'List all tables in the database.', async () => {
    return executeListTablesTool(pipeline);
  });

  server.tool(
    'describe_table',
    'Get detailed information about a specific table: columns, nullability, key, default, extra and row count.',
    {
      table_name: z.string().min(1).describe('The name of the table to describe'),
    },
    async ({ table_name }) => {
      return executeDescribeTableTool(pipeline, { table_name });
    }
  );

  server.tool(
    'get_table_data',
    'Get sample data from a table.',
    {
      table_name: z.string().min(1).describe('The name of the table'),
      limit: z
        .number()
        .int()
        .positive()
        .default(DEFAULT_SAMPLE_LIMIT)
        .describe(`Maximum number of rows to return (default: ${DEFAULT_SAMPLE_LIMIT})`),
    },
    async ({ table_name, limit }) => {
      return executeGetTableDataTool(pipeline, { table_name, limit });
    }
  );

  server.tool(
    'execute_parameterized_query',
    'Execute a SQL statement with placeholders (? for MySQL, $1 for PostgreSQL) bound to the given values.',
    {
      query: z.string().min(1).describe('SQL statement containing placeholders'),
      params: z
        .array(z.union([z.string(), z.number(), z.boolean(), z.null()]))
        .describe('Values bound to the placeholders, in order'),
    },
    async ({ query, params }) => {
      return executeParameterizedQueryTool(pipeline, { query, params });
    }
  );

  // === Resources ===

  server.resource(
    'database_schema',
    'schema://database',
    { description: 'The complete database schema', mimeType: 'text/plain' },
    async (uri) => textResource(uri, await pipeline.schemaDocument())
  );

  server.resource(
    'table_schema',
    new ResourceTemplate('schema://tables/{table_name}', { list: undefined }),
    { description: 'Schema information for a specific table', mimeType: 'text/plain' },
    async (uri, variables) => {
      const result = await executeDescribeTableTool(pipeline, {
        table_name: templateVariable(variables, 'table_name'),
      });
      return textResource(uri, result.content[0].text);
    }
  );

  server.resource(
    'table_data',
    new ResourceTemplate('data://tables/{table_name}', { list: undefined }),
    { description: 'Sample rows from a specific table', mimeType: 'text/plain' },
    async (uri, variables) => {
      const result = await executeGetTableDataTool(pipeline, {
        table_name: templateVariable(variables, 'table_name'),
        limit: RESOURCE_SAMPLE_LIMIT,
      });
      return textResource(uri, result.content[0].text);
    }
  );

  // === Prompts ===

  server.prompt(
    'sql_query_assistant',
    'Generate a prompt for helping with SQL query creation.',
    {
      query_description: z.string().describe('Description of what you want to query'),
    },
    ({ query_description }) => userPrompt(buildQueryAssistantPrompt(query_description))
  );

  server.prompt(
    'database_analysis_task',
    'Generate a prompt for database analysis tasks.',
    {
      analysis_goal: z.string().describe('What you want to analyze in the database'),
    },
    ({ analysis_goal }) => userPrompt(buildAnalysisTaskPrompt(analysis_goal))
  );

  return server;
}

/**
 * Serve the MCP protocol over stdin/stdout
 */
export async function startStdioServer(pipeline: QueryPipeline, logger: Logger): Promise<void> {
  const server = createMcpServer(pipeline);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`${SERVER_NAME} v${SERVER_VERSION} serving MCP over stdio`);

  const shutdown = async () => {
    logger.info('Shutting down...');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
