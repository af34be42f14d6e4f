/**
 * HTTP helpers shared by the API clients
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { z } from 'zod';
import { FetchError } from '../unified.js';
import type { IntegrationSource } from '../types.js';

export interface HttpClientOptions {
  baseUrl: string;
  timeout: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

/**
 * Axios instance whose failures always surface as FetchError
 */
export function createHttpClient(source: IntegrationSource, options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeout,
    headers: {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      ...options.headers,
    },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      throw toFetchError(error, source);
    }
  );

  return client;
}

export function toFetchError(error: unknown, source: IntegrationSource): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    return new FetchError(
      error instanceof Error ? error.message : 'Unknown error',
      source,
      'NETWORK_ERROR'
    );
  }

  if (!error.response) {
    return new FetchError(error.message || 'Network error', source, 'NETWORK_ERROR');
  }

  const status = error.response.status;
  const message = extractErrorMessage(error.response.data);

  if (status === 404) {
    return new FetchError(message || 'Resource not found', source, 'NOT_FOUND', status);
  }

  if (status === 401 || status === 403) {
    return new FetchError(message || 'Authentication failed', source, 'AUTH_ERROR', status);
  }

  if (status === 429) {
    return new FetchError(message || 'Rate limit exceeded', source, 'RATE_LIMIT', status);
  }

  if (status >= 500) {
    return new FetchError(message || 'Server error', source, 'SERVER_ERROR', status);
  }

  return new FetchError(
    message || error.message || 'Unknown API error',
    source,
    'API_ERROR',
    status
  );
}

/**
 * Validate a response body against its schema
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: IntegrationSource,
  endpoint: string
): z.output<S> {
  const validation = schema.safeParse(data);
  if (!validation.success) {
    throw new FetchError(
      `Unexpected response from ${endpoint}: ` +
        validation.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join(', '),
      source,
      'BAD_RESPONSE'
    );
  }
  return validation.data;
}

/**
 * Ozon answers `{ message }`, Yandex Market `{ errors: [{ message }] }`
 */
function extractErrorMessage(data: unknown): string | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  if (typeof data.message === 'string' && data.message) {
    return data.message;
  }
  if (Array.isArray(data.errors)) {
    const first: unknown = data.errors[0];
    if (isRecord(first) && typeof first.message === 'string') {
      return first.message;
    }
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
