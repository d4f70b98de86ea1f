/**
 * Minimal JSON-over-HTTP transport shared by the agent and operator clients.
 */

import type { z } from 'zod';
import { ApiRequestError, toError } from '../core/errors.js';
import { retry } from '../utils/retry.js';
import { ErrorBodySchema } from './schemas.js';

export interface HttpClientOptions {
  baseUrl: string;
  token?: string;
  /** Retries for connection failures; HTTP error statuses are never retried */
  retries?: number;
  fetch?: typeof fetch;
}

export interface RequestOptions {
  /** Safe to resend after a lost connection; defaults to true for GET only */
  idempotent?: boolean;
}

export interface RawResponse {
  status: number;
  body: unknown;
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly retries: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.retries = options.retries ?? 2;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Perform a request; non-2xx statuses are returned, not thrown. */
  async raw(method: 'GET' | 'POST', path: string, body?: unknown, options: RequestOptions = {}): Promise<RawResponse> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const fetchImpl = this.fetchImpl;
    const response = await retry(
      () => fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      }),
      {
        maxRetries: (options.idempotent ?? method === 'GET') ? this.retries : 0,
        // fetch rejects with TypeError when the connection itself fails
        shouldRetry: err => err instanceof TypeError,
      },
    );

    const text = await response.text();
    let parsed: unknown = null;
    if (text.length > 0) {
      try {
        parsed = JSON.parse(text);
      } catch (err) {
        throw new ApiRequestError(
          `Invalid JSON from ${method} ${path}: ${toError(err).message}`,
          response.status,
          'INVALID_RESPONSE',
        );
      }
    }
    return { status: response.status, body: parsed };
  }

  /** Perform a request and validate a 2xx body against `schema`. */
  async request<T extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: T,
    body?: unknown,
    options?: RequestOptions,
  ): Promise<z.output<T>> {
    const response = await this.raw(method, path, body, options);
    if (response.status < 200 || response.status >= 300) {
      throw toApiError(method, path, response);
    }
    return parseResponse(schema, response, `${method} ${path}`);
  }
}

export function toApiError(method: string, path: string, response: RawResponse): ApiRequestError {
  const error = ErrorBodySchema.safeParse(response.body);
  if (error.success) {
    return new ApiRequestError(error.data.error, response.status, error.data.code, error.data.details);
  }
  return new ApiRequestError(`${method} ${path} failed with status ${response.status}`, response.status, 'HTTP_ERROR');
}

export function parseResponse<T extends z.ZodTypeAny>(schema: T, response: RawResponse, label: string): z.output<T> {
  const result = schema.safeParse(response.body);
  if (!result.success) {
    throw new ApiRequestError(
      `Unexpected response from ${label}: ${result.error.issues.map(i => i.message).join('; ')}`,
      response.status,
      'INVALID_RESPONSE',
      result.error.issues,
    );
  }
  return result.data;
}
