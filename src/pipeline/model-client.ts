/**
 * Ollama client for natural-language to SQL translation
 *
 * One attempt per call: no retry, no backoff, no timeout.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ModelUnavailableError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';

export interface ModelClientOptions {
  baseUrl: string;
  model: string;
}

const generateResponseSchema = z.object({
  response: z.string(),
});

export class OllamaClient {
  private readonly endpoint: string;

  constructor(
    private readonly options: ModelClientOptions,
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios.create({
      headers: { 'Content-Type': 'application/json' },
    })
  ) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/api/generate`;
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * Send a prompt and return the raw completion text
   */
  async generate(prompt: string): Promise<string> {
    let status: number;
    let body: unknown;

    try {
      const response = await this.http.post<unknown>(
        this.endpoint,
        { model: this.options.model, prompt, stream: false },
        { validateStatus: () => true }
      );
      status = response.status;
      body = response.data;
    } catch (error) {
      this.logger.error('Error querying Ollama', { error: errorMessage(error) });
      throw new ModelUnavailableError(`Ollama query error: ${errorMessage(error)}`, { cause: error });
    }

    if (status !== 200) {
      this.logger.error('Ollama API error', { status, body });
      throw new ModelUnavailableError(`Ollama API error: HTTP ${status}`);
    }

    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelUnavailableError('Ollama API error: response field missing from body');
    }

    this.logger.debug('Ollama completion received', { length: parsed.data.response.length });
    return parsed.data.response;
  }
}

/**
 * Strip Markdown code-fence markers and surrounding whitespace from a
 * completion. The remaining text is not checked for being valid SQL.
 */
export function cleanSqlResponse(text: string): string {
  return text
    .replace(/```sql/gi, '')
    .replace(/```/g, '')
    .trim();
}
