/**
 * Quota tracking types.
 * Defines the per-endpoint snapshot model and the pre-send decision.
 */

/** Most recently observed rate-limit state for one endpoint key. */
export interface QuotaSnapshot {
  /** Total requests permitted in the current window. */
  limit: number;
  /** Requests left in the current window. */
  remaining: number;
  /** Unix timestamp (ms) when the window resets. */
  resetAt: number;
  /** Unix timestamp (ms) when this snapshot was observed. */
  lastUpdated: number;
}

/** Outcome of consulting the tracker before sending a request. */
export interface QuotaDecision {
  /** Always true: the tracker never refuses, it only asks the caller to wait. */
  proceed: boolean;
  /** Milliseconds to wait before sending; 0 means send now. */
  waitMs: number;
}

/** Public view of a tracked endpoint for monitoring. */
export interface QuotaEntry extends QuotaSnapshot {
  endpoint: string;
}

/** Anything that can look up a response header by name. */
export interface HeaderLookup {
  get(name: string): string | null | undefined;
}
