/**
 * Error classes surfaced by the request orchestrator and the API client.
 * A caller of the orchestrator only ever sees RateLimitExceededError or the
 * underlying transport error (TransportError / HttpStatusError).
 */

/** Error thrown when configuration validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Throttling retries for an endpoint were exhausted. */
export class RateLimitExceededError extends Error {
  public readonly endpoint: string;
  public readonly retriesAttempted: number;

  constructor(endpoint: string, retriesAttempted: number) {
    super(`Rate limit exceeded for ${endpoint} after ${retriesAttempted} retries`);
    this.name = 'RateLimitExceededError';
    this.endpoint = endpoint;
    this.retriesAttempted = retriesAttempted;
  }
}

/** Connection-level failure: DNS, refused connection, reset socket or timeout. */
export class TransportError extends Error {
  public readonly method: string;
  public readonly url: string;
  public readonly timedOut: boolean;

  constructor(method: string, url: string, cause: unknown, timedOut: boolean = false) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      timedOut
        ? `${method} ${url} timed out`
        : `${method} ${url} failed: ${detail}`,
      { cause },
    );
    this.name = 'TransportError';
    this.method = method;
    this.url = url;
    this.timedOut = timedOut;
  }
}

/** A response outside the 2xx/3xx range (other than a 429). */
export class HttpStatusError extends Error {
  public readonly method: string;
  public readonly url: string;
  public readonly status: number;
  public readonly responseBody: string;
  public readonly headers: Headers;

  constructor(method: string, url: string, status: number, headers: Headers, responseBody: string) {
    super(`${method} ${url} returned ${status}`);
    this.name = 'HttpStatusError';
    this.method = method;
    this.url = url;
    this.status = status;
    this.headers = headers;
    this.responseBody = responseBody;
  }
}

/** One entry of an API failure envelope. */
export interface ApiErrorDetail {
  code?: string;
  message?: string;
}

/** A successful HTTP exchange whose JSON envelope reports failure. */
export class ApiResponseError extends Error {
  public readonly errors: ApiErrorDetail[];

  constructor(errors: ApiErrorDetail[]) {
    const summary = errors.map((e) => `${e.code}: ${e.message}`).join('; ');
    super(`API error: ${summary}`);
    this.name = 'ApiResponseError';
    this.errors = errors;
  }
}
