/**
 * HTTP Client
 * Thin fetch wrapper that raises on non-success status, optionally retried
 */

import type { ILogger } from '../infra/logger.js';
import { describeError } from '../infra/logger.js';
import { RetryExecutor } from '../retry/retry-executor.js';
import type { RetryPolicy } from '../retry/retry-policy.js';
import { HTTP_RETRYABLE_ERRORS, NetworkError, createHttpError } from './http-errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RequestOptions {
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  /** Serialized as JSON */
  json?: unknown;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
}

export interface HttpClientOptions {
  headers?: Record<string, string>;
  /**
   * Runs every request through a RetryExecutor. With no retryable kinds listed,
   * server errors and network failures are retried.
   */
  retryPolicy?: RetryPolicy;
  logger?: ILogger;
  executor?: RetryExecutor;
}

export class HttpResponse {
  constructor(
    readonly status: number,
    readonly headers: Headers,
    readonly body: string
  ) {}

  json<T = unknown>(): T {
    return JSON.parse(this.body);
  }
}

export class HttpClient {
  private baseUrl: string;
  private retryPolicy?: RetryPolicy;
  private executor: RetryExecutor;

  constructor(baseUrl: string, private options: HttpClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.executor = options.executor ?? new RetryExecutor(options.logger);

    const policy = options.retryPolicy;
    if (policy) {
      this.retryPolicy = policy.retryableErrorKinds.length > 0
        ? policy
        : { ...policy, retryableErrorKinds: HTTP_RETRYABLE_ERRORS };
    }
  }

  async get(endpoint: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request('GET', endpoint, options);
  }

  async post(endpoint: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request('POST', endpoint, options);
  }

  async put(endpoint: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request('PUT', endpoint, options);
  }

  async delete(endpoint: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request('DELETE', endpoint, options);
  }

  async request(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const send = () => this.send(method, endpoint, options);
    if (!this.retryPolicy) {
      return send();
    }
    return this.executor.execute(send, this.retryPolicy);
  }

  buildUrl(endpoint: string, params?: RequestOptions['params']): string {
    const url = `${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`;
    if (!params || Object.keys(params).length === 0) {
      return url;
    }
    const query = new URLSearchParams(
      Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
    );
    return `${url}?${query.toString()}`;
  }

  private async send(method: HttpMethod, endpoint: string, options: RequestOptions): Promise<HttpResponse> {
    const url = this.buildUrl(endpoint, options.params);
    const headers: Record<string, string> = { ...this.options.headers, ...options.headers };

    const hasContentType = Object.keys(headers).some(name => name.toLowerCase() === 'content-type');

    let body: string | undefined;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      if (!hasContentType) {
        headers['Content-Type'] = 'application/json';
      }
    } else if (options.form) {
      body = new URLSearchParams(options.form).toString();
      if (!hasContentType) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
      }
    }

    this.options.logger?.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body });
    } catch (error) {
      throw new NetworkError(`Failed to reach ${url}: ${describeError(error)}`, url, error);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new NetworkError(`Failed to read response from ${url}: ${describeError(error)}`, url, error);
    }

    if (!response.ok) {
      throw createHttpError(response.status, url, text);
    }

    return new HttpResponse(response.status, response.headers, text);
  }
}
