/**
 * Configuration module for the SQL bridge
 * Parses and validates environment variables
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ConnectionParams, DatabaseDriverName } from './types/index.js';

const DEFAULT_PORTS: Record<DatabaseDriverName, number> = {
  mysql: 3306,
  postgres: 5432,
};

const configSchema = z.object({
  driver: z.enum(['mysql', 'postgres']).describe('Database dialect'),
  database: z.object({
    host: z.string().min(1),
    user: z.string().min(1),
    password: z.string(),
    database: z.string().min(1),
    port: z.number().int().min(1).max(65535),
  }),
  ollamaUrl: z.string().url().describe('Base URL of the Ollama server'),
  ollamaModel: z.string().min(1),
  httpPort: z.number().int().min(0).max(65535).default(8000),
  logLevel: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  logFile: z.string().optional().describe('Append logs to this file as well as stderr'),
});

export type Config = Readonly<z.infer<typeof configSchema>>;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

/**
 * Build the configuration from environment variables.
 * The returned value is frozen and passed to every component that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const driver = env.DB_DRIVER || 'mysql';
  const defaultPort = driver === 'postgres' ? DEFAULT_PORTS.postgres : DEFAULT_PORTS.mysql;

  const rawConfig = {
    driver,
    database: {
      host: env.DB_HOST || 'localhost',
      user: env.DB_USER || 'root',
      password: env.DB_PASSWORD ?? '',
      database: env.DB_NAME || 'test_db',
      port: parseInteger(env.DB_PORT) ?? defaultPort,
    },
    ollamaUrl: env.OLLAMA_URL || 'http://localhost:11434',
    ollamaModel: env.OLLAMA_MODEL || 'llama3.2',
    httpPort: parseInteger(env.HTTP_PORT),
    logLevel: env.LOG_LEVEL || undefined,
    logFile: env.LOG_FILE || undefined,
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigError(`Invalid configuration: ${errors}`);
  }

  const database: ConnectionParams = Object.freeze({ ...result.data.database });
  return Object.freeze({ ...result.data, database });
}
