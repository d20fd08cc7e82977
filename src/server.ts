/**
 * HTTP shell over the query pipeline
 *
 * REST routes for schema, tables and queries, plus the MCP protocol over
 * Streamable HTTP at /mcp.
 */

import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';

import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import {
  ConnectionError,
  DatabaseError,
  ModelUnavailableError,
  NotFoundError,
  TranslationAmbiguousError,
  errorMessage,
} from './errors.js';
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from './mcp-server.js';
import { NO_RESULTS_MESSAGE, formatOutcome, toStructuredData, type QueryPipeline } from './pipeline/index.js';
import type { QueryOutcome } from './types/index.js';
import type { Logger } from './utils/logger.js';

const HTTP_SAMPLE_LIMIT = 5;

const queryRequestSchema = z.object({
  query: z.string().min(1, 'query must not be empty'),
  natural_language: z.boolean().default(false),
});

/**
 * Status code for an error escaping the pipeline
 */
export function statusForError(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof TranslationAmbiguousError) return 422;
  if (error instanceof DatabaseError) return 400;
  if (error instanceof ModelUnavailableError) return 502;
  if (error instanceof ConnectionError) return 503;
  return 500;
}

function outcomeMessage(outcome: QueryOutcome): string {
  if (outcome.kind === 'rows' && outcome.rows.length > 0) {
    return `Query executed successfully. ${outcome.rows.length} rows returned.`;
  }
  return outcome.kind === 'rows' ? NO_RESULTS_MESSAGE : formatOutcome(outcome);
}

export interface HttpApp {
  app: Express;
  closeMcpSessions(): Promise<void>;
}

/**
 * Build the express app without binding a port
 */
export function createApp(pipeline: QueryPipeline, logger: Logger): HttpApp {
  const app = express();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Last-Event-Id'],
    exposedHeaders: ['Mcp-Session-Id'],
  }));
  app.use(express.json());

  const sendError = (res: Response, error: unknown) => {
    const status = statusForError(error);
    if (status >= 500) {
      logger.error('Request failed', { status, error: errorMessage(error) });
    } else {
      logger.warn('Request rejected', { status, error: errorMessage(error) });
    }
    res.status(status).json({ detail: errorMessage(error) });
  };

  // Liveness
  app.get('/', (_req, res) => {
    res.json({ message: `${SERVER_NAME} is running`, version: SERVER_VERSION });
  });

  // Health check: a fresh database connection must open
  app.get('/health', async (_req, res) => {
    try {
      await pipeline.checkConnection();
      res.json({ status: 'healthy', database: 'connected', model: pipeline.modelName });
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });
      res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        detail: errorMessage(error),
      });
    }
  });

  app.get('/schema', async (_req, res) => {
    try {
      const schema = await pipeline.getSchema();
      res.json(schema.tables);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/query', async (req, res) => {
    const parsed = queryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      res.status(400).json({ detail });
      return;
    }

    const { query, natural_language } = parsed.data;

    try {
      const { sql, outcome } = natural_language
        ? await pipeline.naturalLanguageQuery(query)
        : { sql: query, outcome: await pipeline.executeSql(query) };

      res.json({
        success: true,
        data: toStructuredData(outcome),
        message: outcomeMessage(outcome),
        sql_query: sql,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/tables', async (_req, res) => {
    try {
      const tables = await pipeline.listTables();
      res.json({ tables });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/table/:table_name', async (req, res) => {
    const tableName = req.params.table_name;

    try {
      const details = await pipeline.describeTable(tableName);
      if (!details.found) {
        throw new NotFoundError(details.tableName, details.availableTables);
      }

      const sample = await pipeline.getTableData(tableName, HTTP_SAMPLE_LIMIT);
      if (!sample.found) {
        throw new NotFoundError(sample.tableName, sample.availableTables);
      }

      res.json({
        table_name: tableName,
        row_count: details.value.rowCount,
        columns: details.value.columns,
        sample_data: sample.value.rows,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  const closeMcpSessions = mountMcpEndpoint(app, pipeline, logger);

  return { app, closeMcpSessions };
}

/**
 * MCP over Streamable HTTP, one transport per session
 */
function mountMcpEndpoint(
  app: Express,
  pipeline: QueryPipeline,
  logger: Logger
): () => Promise<void> {
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  const sessionTransport = (req: Request): StreamableHTTPServerTransport | undefined => {
    const sessionId = req.headers['mcp-session-id'];
    return typeof sessionId === 'string' ? transports[sessionId] : undefined;
  };

  // POST - initialize sessions and handle requests
  app.post('/mcp', async (req, res) => {
    try {
      const existing = sessionTransport(req);
      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (req.headers['mcp-session-id'] !== undefined || !isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Bad Request: No valid session ID' },
          id: null,
        });
        return;
      }

      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          logger.info(`Session initialized: ${sid}`);
          transports[sid] = transport;
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid && transports[sid]) {
          logger.info(`Session closed: ${sid}`);
          delete transports[sid];
        }
      };

      const server = createMcpServer(pipeline);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', { error: errorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // GET - SSE stream; DELETE - session termination
  const sessionHandler = async (req: Request, res: Response) => {
    const transport = sessionTransport(req);
    if (!transport) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get('/mcp', sessionHandler);
  app.delete('/mcp', sessionHandler);

  return async () => {
    for (const sessionId in transports) {
      await transports[sessionId].close();
      delete transports[sessionId];
    }
  };
}

/**
 * Start the HTTP shell on the given port
 */
export async function startHttpServer(
  pipeline: QueryPipeline,
  port: number,
  logger: Logger
): Promise<Server> {
  const { app, closeMcpSessions } = createApp(pipeline, logger);

  const httpServer = await new Promise<Server>((resolve) => {
    const server = app.listen(port, () => resolve(server));
  });

  logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on port ${port}`);
  logger.info(`  REST API:     http://localhost:${port}/`);
  logger.info(`  MCP endpoint: http://localhost:${port}/mcp`);

  const shutdown = async () => {
    logger.info('Shutting down...');
    try {
      await closeMcpSessions();
    } catch (error) {
      logger.error('Error closing MCP sessions', { error: errorMessage(error) });
    }
    httpServer.close(() => {
      logger.info('Server shutdown complete.');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return httpServer;
}
