/**
 * axios instance whose requests are answered in process
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  data: unknown;
}

export interface RecordedRequest {
  url: string | undefined;
  body: unknown;
}

export function stubHttp(
  reply: (request: RecordedRequest) => StubReply | Promise<StubReply>,
  requests: RecordedRequest[] = []
): AxiosInstance {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const request: RecordedRequest = {
        url: config.url,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      requests.push(request);
      const { status, data } = await reply(request);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
}

/**
 * Instance that fails every request the way an unreachable host does
 */
export function unreachableHttp(requests: RecordedRequest[] = []): AxiosInstance {
  return stubHttp(() => {
    throw new AxiosError('connect ECONNREFUSED 127.0.0.1:11434', 'ECONNREFUSED');
  }, requests);
}

/**
 * Instance that answers like Ollama's /api/generate with the given completion
 */
export function ollamaReplying(completion: string, requests: RecordedRequest[] = []): AxiosInstance {
  return stubHttp(() => ({ status: 200, data: { model: 'llama3.2', response: completion, done: true } }), requests);
}
