/**
 * Checks for failures reported inside a JSON response envelope.
 */

import { ApiResponseError } from '../shared/errors.js';
import type { ApiErrorDetail } from '../shared/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDetails(value: unknown): ApiErrorDetail[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map((e) => ({
    code: typeof e['code'] === 'string' ? e['code'] : undefined,
    message: typeof e['message'] === 'string' ? e['message'] : undefined,
  }));
}

/**
 * Throw ApiResponseError when the envelope reports failure, either through
 * `meta.status: "fail"` with `meta.errors`, or a non-empty `fail` array whose
 * entries carry `errors`.
 */
export function assertEnvelopeOk(body: unknown): void {
  if (!isRecord(body)) {
    return;
  }

  const meta = body['meta'];
  if (isRecord(meta) && meta['status'] === 'fail') {
    throw new ApiResponseError(toDetails(meta['errors']));
  }

  const fail = body['fail'];
  if (Array.isArray(fail) && fail.length > 0) {
    const errors = fail.filter(isRecord).flatMap((f) => toDetails(f['errors']));
    throw new ApiResponseError(errors);
  }
}

/** The `data` member of an envelope, or an empty object when absent. */
export function envelopeData(body: unknown): unknown {
  if (isRecord(body) && body['data'] !== undefined) {
    return body['data'];
  }
  return {};
}
