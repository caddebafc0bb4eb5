export { type IClock, SystemClock, systemClock, sleep } from './timing/clock.js';
export { Deadline } from './timing/deadline.js';
export { type BackoffOptions, type BackoffStrategy, computeBackoffDelay } from './timing/backoff.js';

export {
  type Predicate,
  type PollOutcome,
  type PollStatus,
  type WaitOptions,
  WaitTimeoutError
} from './waiting/types.js';
export { ConditionWaiter, createDefaultConditionWaiter } from './waiting/condition-waiter.js';

export { RetryableError, FatalError, RetryExhaustedError } from './retry/errors.js';
export {
  type AttemptRecord,
  type ErrorKind,
  type RetryPolicy,
  validateRetryPolicy
} from './retry/retry-policy.js';
export {
  type Operation,
  RetryExecutor,
  createDefaultRetryExecutor,
  withRetry
} from './retry/retry-executor.js';

export {
  type IBrowserDriver,
  type LoadState,
  PlaywrightBrowserDriver
} from './driver/browser-driver.js';
export * as conditions from './driver/conditions.js';
export { type ElementState, WaitHelpers } from './driver/wait-helpers.js';

export {
  type HttpClientOptions,
  type HttpMethod,
  type RequestOptions,
  HttpClient,
  HttpResponse
} from './http/http-client.js';
export {
  HTTP_RETRYABLE_ERRORS,
  HttpClientError,
  HttpError,
  HttpServerError,
  NetworkError,
  createHttpError
} from './http/http-errors.js';

export { type ILogger, type LogContext, WinstonLogger, LoggerStub } from './infra/logger.js';
export {
  type HarnessSettings,
  type IConfig,
  ConfigStub,
  ConfigurationError,
  EnvConfig,
  loadHarnessSettings
} from './infra/config.js';
