#!/usr/bin/env node
/**
 * SQL Bridge
 *
 * Exposes a MySQL or PostgreSQL database as MCP tools and HTTP routes, with
 * natural-language queries translated to SQL by a local Ollama model.
 *
 * Usage:
 *   npm start              - MCP over stdio
 *   npm run start:http     - HTTP API (REST routes and MCP at /mcp)
 *
 * Tools provided:
 *   - execute_sql_query: Run a literal SQL statement
 *   - natural_language_query: Translate a request to SQL and run it
 *   - list_tables / describe_table / get_table_data: Table lookups
 *   - execute_parameterized_query: Run a statement with bound values
 */

// Load .env file before anything else
import 'dotenv/config';

import { loadConfig } from './config.js';
import { getDriver } from './database/index.js';
import { createPipeline } from './pipeline/index.js';
import { startStdioServer } from './mcp-server.js';
import { startHttpServer } from './server.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  const pipeline = createPipeline(config, getDriver(config.driver), logger);

  logger.info('Configuration loaded', {
    driver: config.driver,
    host: config.database.host,
    database: config.database.database,
    model: config.ollamaModel,
  });

  if (process.argv.includes('--http')) {
    await startHttpServer(pipeline, config.httpPort, logger);
  } else {
    await startStdioServer(pipeline, logger);
  }
}

main().catch((error) => {
  console.error('Fatal error starting server:', error);
  process.exit(1);
});
