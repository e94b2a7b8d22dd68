/**
 * Rate-limit-aware retrying request orchestrator.
 *
 * One call to `execute` walks PRECHECK -> SENT -> outcome, looping back to
 * PRECHECK after every retryable outcome:
 *
 *   - PRECHECK waits out an exhausted quota window reported by the tracker.
 *   - SENT hands the request to the transport; a thrown transport error is a
 *     transient failure, and so is an error body that cannot be read.
 *   - 429 is throttling. Once its budget is spent the call fails with
 *     RateLimitExceededError.
 *   - Any other status outside 2xx/3xx is a transient failure. Once its
 *     budget is spent the HttpStatusError (or the thrown transport error)
 *     is rethrown unmodified.
 *   - 2xx/3xx responses are returned untouched.
 *
 * Throttling and transient failures each get `maxRetries` retries; the
 * budgets are counted separately. There is no wall-clock deadline.
 */

import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { ConfigError, HttpStatusError, RateLimitExceededError } from '../shared/errors.js';
import { RetrySettingsSchema } from '../config/schema.js';
import type { RetrySettings, RetrySettingsInput } from '../config/types.js';
import { sleep as defaultSleep } from '../shared/sleep.js';
import type { Sleeper } from '../shared/sleep.js';
import type { HttpMethod, Transport, TransportOptions, TransportResponse } from '../transport/types.js';
import { BackoffPolicy } from './backoff.js';
import { endpointKey } from './endpoint-key.js';
import { QuotaTracker } from './tracker.js';

/** Why a retry is about to happen. */
export type RetryReason = 'throttled' | 'transient';

export interface RetryEvent {
  endpoint: string;
  reason: RetryReason;
  /** 1-based retry number within the reason's budget. */
  attempt: number;
  delayMs: number;
  /** Status that triggered the retry, when a response was received. */
  status?: number;
  /** Error that triggered the retry, for transient failures. */
  error?: unknown;
}

export interface OrchestratorRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** JSON-serializable payload. */
  body?: unknown;
  options?: TransportOptions;
}

export interface OrchestratorOptions {
  transport: Transport;
  retry?: RetrySettingsInput;
  /** Shared tracker; a private one is created when omitted. */
  tracker?: QuotaTracker;
  /** Overrides the backoff built from `retry`. */
  backoff?: BackoffPolicy;
  sleep?: Sleeper;
  onRetry?: (event: RetryEvent) => void;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

export class RequestOrchestrator {
  public readonly settings: Readonly<RetrySettings>;
  public readonly tracker: QuotaTracker;
  private readonly transport: Transport;
  private readonly backoff: BackoffPolicy;
  private readonly sleep: Sleeper;
  private readonly onRetry?: (event: RetryEvent) => void;

  /** @throws ConfigError if the retry settings are invalid. */
  constructor(options: OrchestratorOptions) {
    const result = RetrySettingsSchema.safeParse(options.retry ?? {});
    if (!result.success) {
      throw new ConfigError(`Invalid retry settings:\n${z.prettifyError(result.error)}`);
    }

    this.settings = Object.freeze(result.data);
    this.transport = options.transport;
    this.tracker = options.tracker ?? new QuotaTracker();
    this.backoff =
      options.backoff ??
      new BackoffPolicy({
        minBackoffMs: result.data.minBackoffMs,
        maxBackoffMs: result.data.maxBackoffMs,
        jitter: result.data.jitter,
      });
    this.sleep = options.sleep ?? defaultSleep;
    this.onRetry = options.onRetry;
  }

  /**
   * Execute one logical call, retrying throttled and transient outcomes.
   * @returns The first 2xx/3xx response, unchanged.
   * @throws RateLimitExceededError when throttling retries are exhausted.
   * @throws The transport's own error, or HttpStatusError, when transient retries are exhausted.
   * @throws The signal's reason if `options.signal` aborts.
   */
  async execute(request: OrchestratorRequest): Promise<TransportResponse> {
    const { method, url, headers = {}, body, options = {} } = request;
    const endpoint = endpointKey(url);
    const { maxRetries } = this.settings;
    let throttledAttempts = 0;
    let transientAttempts = 0;

    for (;;) {
      // PRECHECK
      const { waitMs } = this.tracker.decision(endpoint);
      if (waitMs > 0) {
        logger.warn(
          { endpoint, waitMs },
          `Rate limit reached for ${endpoint}, waiting ${(waitMs / 1000).toFixed(1)}s`,
        );
        await this.sleep(waitMs, options.signal);
      }

      // SENT
      let response: TransportResponse;
      try {
        response = await this.transport.execute(method, url, headers, body, options);
      } catch (err) {
        if (options.signal?.aborted) {
          throw err;
        }
        transientAttempts++;
        if (transientAttempts > maxRetries) {
          logger.error(
            { endpoint, method, retries: maxRetries, error: errorMessage(err) },
            `Request failed for ${endpoint} after ${maxRetries} retries`,
          );
          throw err;
        }
        await this.backOff({ endpoint, reason: 'transient', attempt: transientAttempts, error: err }, options);
        continue;
      }

      this.tracker.updateFromHeaders(endpoint, { get: (name) => response.header(name) });

      if (response.status === 429) {
        throttledAttempts++;
        if (throttledAttempts > maxRetries) {
          logger.error({ endpoint, retries: maxRetries }, `Rate limit exceeded for ${endpoint}`);
          throw new RateLimitExceededError(endpoint, maxRetries);
        }
        await this.backOff({ endpoint, reason: 'throttled', attempt: throttledAttempts, status: 429 }, options);
        continue;
      }

      if (!isSuccessStatus(response.status)) {
        // A body that fails to arrive is a transport failure like any other.
        let error: unknown;
        try {
          error = new HttpStatusError(method, url, response.status, response.headers, await response.text());
        } catch (err) {
          if (options.signal?.aborted) {
            throw err;
          }
          error = err;
        }
        transientAttempts++;
        if (transientAttempts > maxRetries) {
          logger.error(
            { endpoint, method, status: response.status, retries: maxRetries },
            `Request failed for ${endpoint} after ${maxRetries} retries`,
          );
          throw error;
        }
        await this.backOff(
          { endpoint, reason: 'transient', attempt: transientAttempts, status: response.status, error },
          options,
        );
        continue;
      }

      return response;
    }
  }

  /** Log, notify, then wait the backoff for the given 1-based retry. */
  private async backOff(
    event: Omit<RetryEvent, 'delayMs'>,
    options: TransportOptions,
  ): Promise<void> {
    const delayMs = this.backoff.delay(event.attempt - 1);
    const { maxRetries } = this.settings;

    if (event.reason === 'throttled') {
      logger.warn(
        { endpoint: event.endpoint, attempt: event.attempt, maxRetries, delayMs },
        `Rate limit response for ${event.endpoint}, attempt ${event.attempt}/${maxRetries}, backing off for ${(delayMs / 1000).toFixed(1)}s`,
      );
    } else {
      logger.warn(
        { endpoint: event.endpoint, attempt: event.attempt, maxRetries, delayMs, status: event.status, error: errorMessage(event.error) },
        `Request failed for ${event.endpoint}, attempt ${event.attempt}/${maxRetries}, backing off for ${(delayMs / 1000).toFixed(1)}s`,
      );
    }

    this.onRetry?.({ ...event, delayMs });
    await this.sleep(delayMs, options.signal);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
