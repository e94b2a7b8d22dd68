/**
 * fetch-based transport with its own connection-level retry layer.
 *
 * This layer sits underneath the orchestrator's retry loop and has an
 * independent budget. With `retries > 0` the two stack, so one logical call
 * can reach (1 + retries) * (1 + maxRetries) network attempts per failure
 * class. The default of 0 keeps the orchestrator as the only retry layer.
 */

import { logger } from '../shared/logger.js';
import { TransportError } from '../shared/errors.js';
import { sleep as defaultSleep } from '../shared/sleep.js';
import type { Sleeper } from '../shared/sleep.js';
import { HTTP_METHODS } from './types.js';
import type { HttpMethod, Transport, TransportOptions, TransportResponse } from './types.js';

export interface FetchTransportOptions {
  /** Default per-attempt timeout in milliseconds. */
  timeoutMs?: number;
  /** Low-level retries for connection failures and forcelisted statuses. */
  retries?: number;
  /** Delay before low-level retry n (1-based) is `backoffFactorMs * 2^(n-1)`. */
  backoffFactorMs?: number;
  /** Statuses retried by this layer. */
  statusForcelist?: readonly number[];
  /** Methods this layer is allowed to retry. */
  allowedMethods?: readonly HttpMethod[];
  sleep?: Sleeper;
}

export const DEFAULT_STATUS_FORCELIST: readonly number[] = [429, 500, 502, 503, 504];
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * One network attempt's timeout and abort wiring. Stays armed until the body
 * has been read, so a stalled body times out like a stalled connect.
 */
class Exchange {
  readonly controller = new AbortController();
  private timedOut = false;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly onCallerAbort = (): void => this.controller.abort(this.callerSignal?.reason);

  constructor(
    private readonly method: HttpMethod,
    private readonly url: string,
    timeoutMs: number,
    private readonly callerSignal: AbortSignal | undefined,
  ) {
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);
    // An unread body must not hold the process open.
    this.timer.unref();
    callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
  }

  /** Maps a failure to the caller's abort reason or a TransportError. */
  failure(err: unknown): unknown {
    if (this.callerSignal?.aborted) {
      return this.callerSignal.reason;
    }
    return new TransportError(this.method, this.url, err, this.timedOut);
  }

  release(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}

/** Wraps a fetch Response and buffers its body so it can be read repeatedly. */
class FetchTransportResponse implements TransportResponse {
  private bodyText?: Promise<string>;

  constructor(
    private readonly response: Response,
    private readonly exchange: Exchange,
  ) {}

  get status(): number {
    return this.response.status;
  }

  get headers(): Headers {
    return this.response.headers;
  }

  header(name: string): string | null {
    return this.response.headers.get(name);
  }

  text(): Promise<string> {
    this.bodyText ??= this.readBody();
    return this.bodyText;
  }

  async json(): Promise<unknown> {
    const text = await this.text();
    return text.length === 0 ? null : JSON.parse(text);
  }

  /** Drops the body unread and disarms the timeout. */
  async discard(): Promise<void> {
    try {
      await this.response.body?.cancel();
    } finally {
      this.exchange.release();
    }
  }

  private async readBody(): Promise<string> {
    try {
      return await this.response.text();
    } catch (err) {
      throw this.exchange.failure(err);
    } finally {
      this.exchange.release();
    }
  }
}

export class FetchTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly backoffFactorMs: number;
  private readonly statusForcelist: ReadonlySet<number>;
  private readonly allowedMethods: ReadonlySet<HttpMethod>;
  private readonly sleep: Sleeper;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retries = options.retries ?? 0;
    this.backoffFactorMs = options.backoffFactorMs ?? 500;
    this.statusForcelist = new Set(options.statusForcelist ?? DEFAULT_STATUS_FORCELIST);
    this.allowedMethods = new Set(options.allowedMethods ?? HTTP_METHODS);
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    options: TransportOptions = {},
  ): Promise<TransportResponse> {
    const canRetry = this.allowedMethods.has(method);
    const requestHeaders: Record<string, string> = { ...headers };
    let payload: string | undefined;
    if (body !== undefined && body !== null) {
      payload = JSON.stringify(body);
      if (!Object.keys(requestHeaders).some((h) => h.toLowerCase() === 'content-type')) {
        requestHeaders['Content-Type'] = 'application/json';
      }
    }

    for (let attempt = 0; ; attempt++) {
      const retriesLeft = canRetry && attempt < this.retries;
      let response: FetchTransportResponse;
      try {
        response = await this.fetchOnce(method, url, requestHeaders, payload, options);
      } catch (err) {
        if (!(err instanceof TransportError) || !retriesLeft) {
          throw err;
        }
        const delayMs = this.backoffFactorMs * Math.pow(2, attempt);
        logger.debug(
          { method, url, attempt: attempt + 1, retries: this.retries, delayMs, error: err.message },
          'Transport retrying after connection failure',
        );
        await this.sleep(delayMs, options.signal);
        continue;
      }

      if (retriesLeft && this.statusForcelist.has(response.status)) {
        const delayMs = this.backoffFactorMs * Math.pow(2, attempt);
        logger.debug(
          { method, url, status: response.status, attempt: attempt + 1, retries: this.retries, delayMs },
          'Transport retrying forcelisted status',
        );
        await response.discard();
        await this.sleep(delayMs, options.signal);
        continue;
      }

      return response;
    }
  }

  /**
   * One network attempt with its own timeout, linked to the caller's signal.
   * The timeout also covers reading the body of the returned response.
   */
  private async fetchOnce(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    payload: string | undefined,
    options: TransportOptions,
  ): Promise<FetchTransportResponse> {
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      throw callerSignal.reason;
    }

    const exchange = new Exchange(method, url, options.timeoutMs ?? this.timeoutMs, callerSignal);
    const start = performance.now();
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: exchange.controller.signal,
      });
    } catch (err) {
      exchange.release();
      throw exchange.failure(err);
    }
    logger.debug(
      { method, url, status: response.status, latencyMs: Math.round(performance.now() - start) },
      'Transport received response',
    );
    return new FetchTransportResponse(response, exchange);
  }
}
