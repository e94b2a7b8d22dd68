/**
 * Public entry point for the mimecast-api-client library.
 */

export { ApiClient, DEFAULT_BASE_URL, joinUrl } from './client/api-client.js';
export type { ApiClientOptions, RequestOptions } from './client/api-client.js';
export { StaticTokenCredentials } from './client/credentials.js';
export type { CredentialProvider } from './client/credentials.js';
export { assertEnvelopeOk, envelopeData } from './client/envelope.js';
export { getApiUrl, getRegionDescription, listRegions } from './client/regions.js';

export { RequestOrchestrator, isSuccessStatus } from './ratelimit/orchestrator.js';
export type {
  OrchestratorOptions,
  OrchestratorRequest,
  RetryEvent,
  RetryReason,
} from './ratelimit/orchestrator.js';
export { QuotaTracker, RESET_BUFFER_MS } from './ratelimit/tracker.js';
export { BackoffPolicy } from './ratelimit/backoff.js';
export type { BackoffOptions } from './ratelimit/backoff.js';
export { endpointKey } from './ratelimit/endpoint-key.js';
export { LIMIT_HEADER, REMAINING_HEADER, RESET_HEADER } from './ratelimit/headers.js';
export type { HeaderLookup, QuotaDecision, QuotaEntry, QuotaSnapshot } from './ratelimit/types.js';

export { FetchTransport, DEFAULT_STATUS_FORCELIST } from './transport/fetch-transport.js';
export type { FetchTransportOptions } from './transport/fetch-transport.js';
export { HTTP_METHODS } from './transport/types.js';
export type { HttpMethod, Transport, TransportOptions, TransportResponse } from './transport/types.js';

export { loadConfig, resolveConfigPath } from './config/loader.js';
export type {
  Config,
  ClientSettings,
  RetrySettings,
  RetrySettingsInput,
  TransportSettings,
} from './config/types.js';

export {
  ApiResponseError,
  ConfigError,
  HttpStatusError,
  RateLimitExceededError,
  TransportError,
} from './shared/errors.js';
export type { ApiErrorDetail } from './shared/errors.js';
export { sleep } from './shared/sleep.js';
export type { Sleeper } from './shared/sleep.js';
export { logger } from './shared/logger.js';
