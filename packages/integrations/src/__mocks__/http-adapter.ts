/**
 * Mock HTTP Transport
 * In-process axios adapter that records requests and answers from a handler
 */

import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  headers: Record<string, unknown>;
}

export type MockReply =
  | { status?: number; data?: unknown }
  | { networkError: string };

export type MockHandler = (request: RecordedRequest, index: number) => MockReply | Promise<MockReply>;

export interface MockTransport {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
}

function decodeBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * Behaves like the built-in adapters: statuses of 400 and above reject
 * with an AxiosError carrying the response.
 */
export function createMockTransport(handler: MockHandler): MockTransport {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: decodeBody(config.data),
      headers: config.headers.toJSON(),
    };
    const index = requests.length;
    requests.push(request);

    const reply = await handler(request, index);

    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
    }

    const response: AxiosResponse = {
      status: reply.status ?? 200,
      statusText: '',
      data: reply.data,
      headers: {},
      config,
    };

    if (response.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }

    return response;
  };

  return { adapter, requests };
}
