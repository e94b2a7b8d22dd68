/**
 * In-process transport stand-in for orchestrator and client tests.
 */

import { vi } from 'vitest';
import type { Transport, TransportResponse } from '../../transport/types.js';

export function fakeResponse(
  status: number,
  headers: Record<string, string> = {},
  body: string = '',
): TransportResponse {
  const h = new Headers(headers);
  return {
    status,
    headers: h,
    header: (name) => h.get(name),
    text: async () => body,
    json: async () => (body.length === 0 ? null : JSON.parse(body)),
  };
}

/** Rate-limit headers for a window resetting at `resetSeconds` (Unix seconds). */
export function quotaHeaders(limit: number, remaining: number, resetSeconds: number): Record<string, string> {
  return {
    'x-mc-rate-limit': String(limit),
    'x-mc-rate-limit-remaining': String(remaining),
    'x-mc-rate-limit-reset': String(resetSeconds),
  };
}

export function fakeTransport() {
  const execute = vi.fn<Transport['execute']>();
  const transport: Transport = { execute };
  return { transport, execute };
}

/** Sleeper that records requested durations and resolves immediately. */
export function recordingSleep() {
  const waits: number[] = [];
  const sleep = vi.fn(async (ms: number, _signal?: AbortSignal) => {
    waits.push(ms);
  });
  return { sleep, waits };
}
