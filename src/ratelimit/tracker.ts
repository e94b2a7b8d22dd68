/**
 * In-memory quota tracker keyed by endpoint.
 * Holds the most recently observed rate-limit snapshot per endpoint key and
 * answers whether a request should wait for the quota window to reset.
 *
 * Every method runs to completion without awaiting, so a decision and the
 * snapshot it reads are never interleaved with another caller's update.
 * That single critical section covers all endpoints.
 */

import { logger } from '../shared/logger.js';
import {
  LIMIT_HEADER,
  REMAINING_HEADER,
  RESET_HEADER,
  parseIntegerHeader,
} from './headers.js';
import type { HeaderLookup, QuotaDecision, QuotaEntry, QuotaSnapshot } from './types.js';

/** Safety margin added to every reset wait to absorb clock skew. */
export const RESET_BUFFER_MS = 1000;

export class QuotaTracker {
  private snapshots = new Map<string, QuotaSnapshot>();

  /**
   * @param now - Clock returning epoch milliseconds. Injected in tests.
   */
  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Replace the snapshot for an endpoint from raw header values.
   * If any value is missing or not an integer the tracker is left untouched.
   * Never throws.
   */
  update(
    endpoint: string,
    limitHeader: string | null | undefined,
    remainingHeader: string | null | undefined,
    resetHeader: string | null | undefined,
  ): void {
    if (limitHeader == null || remainingHeader == null || resetHeader == null) {
      logger.debug({ endpoint }, 'Rate limit headers absent, quota not updated');
      return;
    }

    const limit = parseIntegerHeader(limitHeader);
    const remaining = parseIntegerHeader(remainingHeader);
    const resetSeconds = parseIntegerHeader(resetHeader);

    if (limit === null || remaining === null || resetSeconds === null) {
      logger.warn(
        { endpoint, limitHeader, remainingHeader, resetHeader },
        'Failed to parse rate limit headers',
      );
      return;
    }

    const snapshot: QuotaSnapshot = {
      limit,
      remaining,
      resetAt: resetSeconds * 1000,
      lastUpdated: this.now(),
    };
    this.snapshots.set(endpoint, snapshot);

    logger.debug(
      { endpoint, limit, remaining, resetAt: new Date(snapshot.resetAt).toISOString() },
      `Rate limits for ${endpoint}: ${remaining}/${limit} remaining`,
    );
  }

  /** Read the three rate-limit headers from a response and update. */
  updateFromHeaders(endpoint: string, headers: HeaderLookup): void {
    this.update(
      endpoint,
      headers.get(LIMIT_HEADER),
      headers.get(REMAINING_HEADER),
      headers.get(RESET_HEADER),
    );
  }

  /**
   * Decide whether a request to `endpoint` may go out now.
   * Unknown endpoints and endpoints with quota left proceed immediately.
   * An exhausted endpoint waits until its window resets, plus a buffer.
   * A reset time already in the past is treated as stale and proceeds.
   */
  decision(endpoint: string): QuotaDecision {
    const snapshot = this.snapshots.get(endpoint);
    if (!snapshot || snapshot.remaining > 0) {
      return { proceed: true, waitMs: 0 };
    }

    const now = this.now();
    if (snapshot.resetAt > now) {
      return { proceed: true, waitMs: snapshot.resetAt - now + RESET_BUFFER_MS };
    }

    return { proceed: true, waitMs: 0 };
  }

  /** Copy of the snapshot for an endpoint, or undefined if never observed. */
  getSnapshot(endpoint: string): QuotaSnapshot | undefined {
    const snapshot = this.snapshots.get(endpoint);
    return snapshot ? { ...snapshot } : undefined;
  }

  /** All tracked endpoints, for monitoring. */
  getAllSnapshots(): QuotaEntry[] {
    const entries: QuotaEntry[] = [];
    for (const [endpoint, snapshot] of this.snapshots) {
      entries.push({ endpoint, ...snapshot });
    }
    return entries;
  }

  /** Forget every snapshot. */
  clear(): void {
    this.snapshots.clear();
    logger.debug('QuotaTracker cleared');
  }
}
