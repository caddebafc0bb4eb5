import type { ErrorKind } from '../retry/retry-policy.js';

/**
 * Non-2xx response.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly body: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** 4xx: the request itself is wrong, repeating it will not help */
export class HttpClientError extends HttpError {
  constructor(message: string, status: number, url: string, body: string) {
    super(message, status, url, body);
    this.name = 'HttpClientError';
  }
}

/** 5xx */
export class HttpServerError extends HttpError {
  constructor(message: string, status: number, url: string, body: string) {
    super(message, status, url, body);
    this.name = 'HttpServerError';
  }
}

/**
 * The request never produced a response (refused connection, DNS, reset).
 */
export class NetworkError extends Error {
  constructor(message: string, public readonly url: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'NetworkError';
  }
}

export const HTTP_RETRYABLE_ERRORS: ReadonlyArray<ErrorKind> = [HttpServerError, NetworkError];

export function createHttpError(status: number, url: string, body: string): HttpError {
  const message = `HTTP ${status} for ${url}${body ? `: ${body}` : ''}`;
  if (status >= 500) {
    return new HttpServerError(message, status, url, body);
  }
  if (status >= 400) {
    return new HttpClientError(message, status, url, body);
  }
  return new HttpError(message, status, url, body);
}
