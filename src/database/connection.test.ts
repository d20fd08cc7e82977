import { describe, it, expect, vi } from 'vitest';
import { columnFromDescribeRow, withConnection, type DatabaseConnection } from './connection.js';
import { mysqlDialect } from './mysql.js';
import { postgresDialect } from './postgres.js';
import { getDriver } from './index.js';
import { ConnectionError, DatabaseError } from '../errors.js';
import { createFakeDatabase, TEST_CONNECTION } from '../testing/fake-database.js';
import type { Row } from '../types/index.js';
import { createSilentLogger } from '../utils/logger.js';

const logger = createSilentLogger();

describe('withConnection', () => {
  it('closes the connection after success', async () => {
    const fake = createFakeDatabase();

    await expect(
      withConnection(fake.driver, TEST_CONNECTION, logger, async connection => {
        const { rows } = await connection.execute('SELECT 1');
        return rows.length;
      })
    ).resolves.toBe(1);
    expect(fake.connectionsClosed).toBe(1);
  });

  it('closes the connection and wraps plain errors as DatabaseError', async () => {
    const fake = createFakeDatabase();

    const failure = withConnection(fake.driver, TEST_CONNECTION, logger, async () => {
      throw new Error("Duplicate entry '1' for key 'PRIMARY'");
    });

    await expect(failure).rejects.toBeInstanceOf(DatabaseError);
    await expect(failure).rejects.toThrow("Duplicate entry '1' for key 'PRIMARY'");
    expect(fake.connectionsClosed).toBe(1);
  });

  it('converts connect failures to ConnectionError', async () => {
    const fake = createFakeDatabase({ connectError: new Error('getaddrinfo ENOTFOUND db') });

    await expect(
      withConnection(fake.driver, TEST_CONNECTION, logger, async () => 'unreachable')
    ).rejects.toThrow(new ConnectionError('Database connection error: getaddrinfo ENOTFOUND db'));
    expect(fake.connectionsClosed).toBe(0);
  });
  it('keeps the result when close fails', async () => {
    const fake = createFakeDatabase({ closeError: new Error('Connection lost: The server closed the connection.') });
    const warn = vi.spyOn(logger, 'warn');

    await expect(
      withConnection(fake.driver, TEST_CONNECTION, logger, async connection => {
        const { rows } = await connection.execute('SELECT 1');
        return rows;
      })
    ).resolves.toEqual([{ 1: 1 }]);
    expect(warn).toHaveBeenCalledWith('Error closing database connection', {
      error: 'Connection lost: The server closed the connection.',
    });
    warn.mockRestore();
  });

  it('keeps the statement error when close fails', async () => {
    const fake = createFakeDatabase({ closeError: new Error('Connection lost: The server closed the connection.') });

    const failure = withConnection(fake.driver, TEST_CONNECTION, logger, connection =>
      connection.execute('DESCRIBE `nope`')
    );

    await expect(failure).rejects.toBeInstanceOf(DatabaseError);
    await expect(failure).rejects.toThrow("Table 'test_db.nope' doesn't exist");
    expect(fake.connectionsClosed).toBe(1);
  });
});

describe('columnFromDescribeRow', () => {
  it('keeps reported values and maps nullability', () => {
    expect(
      columnFromDescribeRow({
        Field: 'created_at',
        Type: Buffer.from('timestamp'),
        Null: 'NO',
        Key: '',
        Default: 'CURRENT_TIMESTAMP',
        Extra: 'DEFAULT_GENERATED',
      })
    ).toEqual({
      name: 'created_at',
      type: 'timestamp',
      nullable: false,
      key: '',
      default: 'CURRENT_TIMESTAMP',
      extra: 'DEFAULT_GENERATED',
    });
  });

  it('keeps a null default as null', () => {
    expect(columnFromDescribeRow({ Field: 'a', Type: 'int', Null: 'YES', Key: 'MUL', Default: null, Extra: '' }).default).toBeNull();
  });
});

describe('quoteIdentifier', () => {
  it('uses backticks for MySQL', () => {
    expect(mysqlDialect.quoteIdentifier('order`items')).toBe('`order``items`');
  });

  it('uses double quotes for PostgreSQL', () => {
    expect(postgresDialect.quoteIdentifier('Order "Items"')).toBe('"Order ""Items"""');
  });
});

describe('postgresDialect', () => {
  function recordingConnection(rows: Row[], statements: Array<{ sql: string; params?: unknown[] }>): DatabaseConnection {
    return {
      async execute(sql, params) {
        statements.push({ sql, params });
        return { rows, rowCount: rows.length };
      },
      async commit() {},
      async close() {},
    };
  }

  it('lists tables of the current schema', async () => {
    const statements: Array<{ sql: string; params?: unknown[] }> = [];
    const connection = recordingConnection([{ table_name: 'users' }, { table_name: 'orders' }], statements);

    await expect(postgresDialect.listTables(connection)).resolves.toEqual(['users', 'orders']);
    expect(statements[0].sql).toContain('information_schema.tables');
  });

  it('describes a table through a bound parameter', async () => {
    const statements: Array<{ sql: string; params?: unknown[] }> = [];
    const connection = recordingConnection(
      [{ Field: 'id', Type: 'integer', Null: 'NO', Key: 'PRI', Default: "nextval('users_id_seq'::regclass)", Extra: 'auto_increment' }],
      statements
    );

    await expect(postgresDialect.describeTable(connection, 'users')).resolves.toEqual([
      {
        name: 'id',
        type: 'integer',
        nullable: false,
        key: 'PRI',
        default: "nextval('users_id_seq'::regclass)",
        extra: 'auto_increment',
      },
    ]);
    expect(statements[0].params).toEqual(['users']);
  });
});

describe('getDriver', () => {
  it('selects the driver by name', () => {
    expect(getDriver('mysql').name).toBe('mysql');
    expect(getDriver('postgres').name).toBe('postgres');
  });
});
