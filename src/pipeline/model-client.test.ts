import { describe, it, expect } from 'vitest';
import { OllamaClient, cleanSqlResponse } from './model-client.js';
import { ModelUnavailableError } from '../errors.js';
import { createSilentLogger } from '../utils/logger.js';
import {
  ollamaReplying,
  stubHttp,
  unreachableHttp,
  type RecordedRequest,
} from '../testing/stub-http.js';

const options = { baseUrl: 'http://localhost:11434/', model: 'llama3.2' };
const logger = createSilentLogger();

describe('OllamaClient.generate', () => {
  it('posts the prompt with streaming disabled and returns the completion', async () => {
    const requests: RecordedRequest[] = [];
    const client = new OllamaClient(options, logger, ollamaReplying('SELECT 1', requests));

    await expect(client.generate('list users')).resolves.toBe('SELECT 1');
    expect(requests).toEqual([
      {
        url: 'http://localhost:11434/api/generate',
        body: { model: 'llama3.2', prompt: 'list users', stream: false },
      },
    ]);
  });

  it('fails with ModelUnavailable on a non-200 status', async () => {
    const client = new OllamaClient(
      options,
      logger,
      stubHttp(() => ({ status: 404, data: { error: "model 'llama3.2' not found" } }))
    );

    const failure = client.generate('x');
    await expect(failure).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(failure).rejects.toThrow('Ollama API error: HTTP 404');
  });

  it('fails with ModelUnavailable when the endpoint is unreachable', async () => {
    const requests: RecordedRequest[] = [];
    const client = new OllamaClient(options, logger, unreachableHttp(requests));

    const failure = client.generate('x');
    await expect(failure).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(failure).rejects.toThrow(
      'Ollama query error: connect ECONNREFUSED 127.0.0.1:11434'
    );
    // a single attempt, no retry
    expect(requests).toHaveLength(1);
  });

  it('fails with ModelUnavailable when the body has no response field', async () => {
    const client = new OllamaClient(options, logger, stubHttp(() => ({ status: 200, data: { done: true } })));
    await expect(client.generate('x')).rejects.toBeInstanceOf(ModelUnavailableError);
  });
});

describe('cleanSqlResponse', () => {
  it('strips sql code fences and surrounding whitespace', () => {
    expect(cleanSqlResponse('\n```sql\nSELECT * FROM users;\n```\n')).toBe('SELECT * FROM users;');
  });

  it('strips bare and upper-case fences', () => {
    expect(cleanSqlResponse('```\nSELECT 1\n```')).toBe('SELECT 1');
    expect(cleanSqlResponse('```SQL\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('is a no-op on clean SQL', () => {
    const sql = 'SELECT id, name FROM users WHERE id = 1';
    expect(cleanSqlResponse(sql)).toBe(sql);
    expect(cleanSqlResponse(cleanSqlResponse(sql))).toBe(sql);
  });

  it('passes prose through unchanged apart from trimming', () => {
    expect(cleanSqlResponse('  Sure! Here is the query.  ')).toBe('Sure! Here is the query.');
  });
});
