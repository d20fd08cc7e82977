import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  file?: string;
  silent?: boolean;
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...meta,
    });
  })
);

// stdout belongs to the stdio MCP transport, so the console transport writes every level to stderr
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export function createLogger(options: LoggerOptions = {}): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
  ];

  if (options.file) {
    transports.push(
      new winston.transports.File({
        filename: options.file,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: options.level || 'info',
    format: logFormat,
    defaultMeta: { service: 'sql-bridge' },
    transports,
    silent: options.silent,
  });
}

/**
 * Logger that discards everything; used where no logger is supplied
 */
export function createSilentLogger(): Logger {
  return createLogger({ silent: true });
}
