import { describe, it, expect } from 'vitest';
import { QueryExecutor, isReadStatement } from './query-executor.js';
import { ConnectionError, DatabaseError } from '../errors.js';
import { createSilentLogger } from '../utils/logger.js';
import { createFakeDatabase, TEST_CONNECTION } from '../testing/fake-database.js';

const logger = createSilentLogger();

describe('isReadStatement', () => {
  it.each([
    ['SELECT 1', true],
    ['  select * from users', true],
    ['\n\tSeLeCt id FROM t', true],
    ['INSERT INTO t VALUES (1)', false],
    ['UPDATE t SET a = 1', false],
    ['WITH x AS (SELECT 1) SELECT * FROM x', false],
    ['SHOW TABLES', false],
  ])('%j → %s', (sql, expected) => {
    expect(isReadStatement(sql)).toBe(expected);
  });
});

describe('QueryExecutor', () => {
  it('returns the row set of a read without committing', async () => {
    const fake = createFakeDatabase({
      onStatement: sql =>
        sql === 'SELECT 1 as test_column' ? { rows: [{ test_column: 1 }], rowCount: 1 } : undefined,
    });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    await expect(executor.run('SELECT 1 as test_column')).resolves.toEqual({
      kind: 'rows',
      rows: [{ test_column: 1 }],
    });
    expect(fake.commits).toBe(0);
    expect(fake.connectionsClosed).toBe(1);
  });

  it('treats an empty row set as a valid outcome', async () => {
    const fake = createFakeDatabase({ onStatement: () => ({ rows: [], rowCount: 0 }) });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    await expect(executor.run('SELECT * FROM users WHERE 1 = 0')).resolves.toEqual({
      kind: 'rows',
      rows: [],
    });
  });

  it('commits writes and reports the driver row count', async () => {
    const fake = createFakeDatabase({ onStatement: () => ({ rows: [], rowCount: 4 }) });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    await expect(executor.run("UPDATE users SET status = 'inactive'")).resolves.toEqual({
      kind: 'affected',
      affectedRows: 4,
    });
    expect(fake.commits).toBe(1);
    expect(fake.connectionsClosed).toBe(1);
  });

  it('classifies a CTE as a write even though it returns rows', async () => {
    const fake = createFakeDatabase({ onStatement: () => ({ rows: [{ x: 1 }], rowCount: 1 }) });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    await expect(executor.run('WITH x AS (SELECT 1) SELECT * FROM x')).resolves.toEqual({
      kind: 'affected',
      affectedRows: 1,
    });
    expect(fake.commits).toBe(1);
  });

  it('raises DatabaseError with the driver message and still closes the connection', async () => {
    const fake = createFakeDatabase();
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    const failure = executor.run('SELEC nonsense');
    await expect(failure).rejects.toBeInstanceOf(DatabaseError);
    await expect(failure).rejects.toThrow("You have an error in your SQL syntax near 'SELEC nonsense'");
    expect(fake.commits).toBe(0);
    expect(fake.connectionsClosed).toBe(fake.connectionsOpened);
  });

  it('raises ConnectionError when the database is unreachable', async () => {
    const fake = createFakeDatabase({ connectError: new Error("Access denied for user 'tester'") });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    const failure = executor.run('SELECT 1');
    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow("Database connection error: Access denied for user 'tester'");
    expect(fake.statements).toEqual([]);
  });

  it('binds values for parameterized statements', async () => {
    const fake = createFakeDatabase({ onStatement: () => ({ rows: [], rowCount: 1 }) });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    await expect(
      executor.runParameterized('DELETE FROM users WHERE id = ?', [42])
    ).resolves.toEqual({ kind: 'affected', affectedRows: 1 });
    expect(fake.statements).toEqual(['DELETE FROM users WHERE id = ?']);
    expect(fake.lastParams).toEqual([42]);
  });

  it('passes no values for literal statements', async () => {
    const fake = createFakeDatabase({ onStatement: () => ({ rows: [], rowCount: 0 }) });
    const executor = new QueryExecutor(fake.driver, TEST_CONNECTION, logger);

    await executor.run('SELECT 1 WHERE 1 = 0');
    expect(fake.lastParams).toBeUndefined();
  });
});
