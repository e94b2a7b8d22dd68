/**
 * API client: resolves the base URL, attaches credentials and routes every
 * call through the rate-limit-aware orchestrator.
 */

import { logger } from '../shared/logger.js';
import { ConfigError, RateLimitExceededError } from '../shared/errors.js';
import type { Sleeper } from '../shared/sleep.js';
import type { Config, RetrySettingsInput } from '../config/types.js';
import { RequestOrchestrator } from '../ratelimit/orchestrator.js';
import type { RetryEvent } from '../ratelimit/orchestrator.js';
import type { QuotaTracker } from '../ratelimit/tracker.js';
import { FetchTransport } from '../transport/fetch-transport.js';
import type { FetchTransportOptions } from '../transport/fetch-transport.js';
import type { HttpMethod, Transport, TransportResponse } from '../transport/types.js';
import { StaticTokenCredentials } from './credentials.js';
import type { CredentialProvider } from './credentials.js';
import { assertEnvelopeOk, envelopeData } from './envelope.js';
import { getApiUrl } from './regions.js';

export const DEFAULT_BASE_URL = 'https://api.services.mimecast.com';

export interface ApiClientOptions {
  credentials: CredentialProvider;
  /** Full base URL. Mutually exclusive with `region`. */
  baseUrl?: string;
  /** Region code resolved through the region table. */
  region?: string;
  retry?: RetrySettingsInput;
  /** Custom transport; `transportOptions` is ignored when given. */
  transport?: Transport;
  transportOptions?: FetchTransportOptions;
  tracker?: QuotaTracker;
  sleep?: Sleeper;
  onRetry?: (event: RetryEvent) => void;
}

export interface RequestOptions {
  /** JSON payload. */
  json?: unknown;
  /** Extra headers; these win over the credential headers. */
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Join a base URL and a path with exactly one slash between them. */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function resolveBaseUrl(baseUrl?: string, region?: string): string {
  if (baseUrl && region) {
    throw new ConfigError('baseUrl and region are mutually exclusive');
  }
  if (region) {
    const url = getApiUrl(region);
    if (!url) {
      throw new ConfigError(`Unknown region "${region}"`);
    }
    return url;
  }
  return baseUrl ?? DEFAULT_BASE_URL;
}

export class ApiClient {
  public readonly baseUrl: string;
  public readonly orchestrator: RequestOrchestrator;
  private readonly credentials: CredentialProvider;

  /** @throws ConfigError on an unknown region or invalid retry settings. */
  constructor(options: ApiClientOptions) {
    this.baseUrl = resolveBaseUrl(options.baseUrl, options.region);
    this.credentials = options.credentials;
    this.orchestrator = new RequestOrchestrator({
      transport: options.transport ?? new FetchTransport(options.transportOptions),
      retry: options.retry,
      tracker: options.tracker,
      sleep: options.sleep,
      onRetry: options.onRetry,
    });
  }

  /** Build a client from a validated config file. */
  static fromConfig(config: Config, overrides: Partial<ApiClientOptions> = {}): ApiClient {
    return new ApiClient({
      credentials: new StaticTokenCredentials(config.client.token),
      baseUrl: config.client.baseUrl,
      region: config.client.region,
      retry: config.retry,
      transportOptions: config.transport,
      ...overrides,
    });
  }

  /**
   * Send a request to `path` relative to the base URL.
   * @throws RateLimitExceededError when throttling retries run out.
   * @throws TransportError or HttpStatusError when transient retries run out.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    const url = joinUrl(this.baseUrl, path);
    const headers = {
      ...(await this.credentials.getAuthHeaders()),
      ...options.headers,
    };

    try {
      const response = await this.orchestrator.execute({
        method,
        url,
        headers,
        body: options.json,
        options: { timeoutMs: options.timeoutMs, signal: options.signal },
      });
      logger.debug({ method, url, status: response.status }, 'API request succeeded');
      return response;
    } catch (err) {
      if (err instanceof RateLimitExceededError) {
        logger.error({ method, url, endpoint: err.endpoint }, `Rate limit exceeded: ${err.message}`);
      } else {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ method, url, error: message }, 'API request failed');
      }
      throw err;
    }
  }

  get(path: string, options?: RequestOptions): Promise<TransportResponse> {
    return this.request('GET', path, options);
  }

  post(path: string, options?: RequestOptions): Promise<TransportResponse> {
    return this.request('POST', path, options);
  }

  put(path: string, options?: RequestOptions): Promise<TransportResponse> {
    return this.request('PUT', path, options);
  }

  delete(path: string, options?: RequestOptions): Promise<TransportResponse> {
    return this.request('DELETE', path, options);
  }

  /**
   * Send a request and unwrap the JSON envelope.
   * @returns The envelope's `data` member, or `{}` when it has none.
   * @throws ApiResponseError when the envelope reports failure.
   */
  async getData(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown> {
    const response = await this.request(method, path, options);
    const body = await response.json();
    assertEnvelopeOk(body);
    return envelopeData(body);
  }
}
