/**
 * Error taxonomy shared by the pipeline and both transport shells
 */

export type ErrorCode =
  | 'CONNECTION_ERROR'
  | 'DATABASE_ERROR'
  | 'TRANSLATION_AMBIGUOUS'
  | 'MODEL_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'CONFIG_ERROR';

export class SqlBridgeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Database unreachable or credentials rejected */
export class ConnectionError extends SqlBridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_ERROR', message, options);
  }
}

/** Statement failed: syntax, constraint, missing table */
export class DatabaseError extends SqlBridgeError {
  constructor(
    message: string,
    options?: { cause?: unknown },
    code: ErrorCode = 'DATABASE_ERROR'
  ) {
    super(code, message, options);
  }
}

/**
 * Model output could not be executed. Only detected once the cleaned
 * text fails at the database, so it is a DatabaseError as well.
 */
export class TranslationAmbiguousError extends DatabaseError {
  readonly sql: string;

  constructor(sql: string, cause: DatabaseError) {
    super(
      `Generated SQL could not be executed: ${cause.message}`,
      { cause },
      'TRANSLATION_AMBIGUOUS'
    );
    this.sql = sql;
  }
}

/** Inference endpoint unreachable or answered with a non-200 status */
export class ModelUnavailableError extends SqlBridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MODEL_UNAVAILABLE', message, options);
  }
}

export class NotFoundError extends SqlBridgeError {
  readonly availableTables: string[];

  constructor(tableName: string, availableTables: string[]) {
    super('NOT_FOUND', formatNotFoundMessage(tableName, availableTables));
    this.availableTables = availableTables;
  }
}

export class ConfigError extends SqlBridgeError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export function formatNotFoundMessage(tableName: string, availableTables: string[]): string {
  return `Table '${tableName}' not found. Available tables: ${availableTables.join(', ')}`;
}

/**
 * Extract a human-readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error occurred';
}
