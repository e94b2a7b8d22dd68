import { describe, it, expect } from 'vitest';
import {
  ApiResponseError,
  ConfigError,
  HttpStatusError,
  RateLimitExceededError,
  TransportError,
} from '../errors.js';

describe('ConfigError', () => {
  it('creates an error with the correct name and message', () => {
    const err = new ConfigError('Bad config');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('Bad config');
  });
});

describe('RateLimitExceededError', () => {
  it('carries the endpoint and retries consumed', () => {
    const err = new RateLimitExceededError('email/send', 3);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('RateLimitExceededError');
    expect(err.endpoint).toBe('email/send');
    expect(err.retriesAttempted).toBe(3);
    expect(err.message).toBe('Rate limit exceeded for email/send after 3 retries');
  });
});

describe('TransportError', () => {
  it('describes a connection failure and keeps the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new TransportError('GET', 'https://host/a/b', cause);
    expect(err.name).toBe('TransportError');
    expect(err.message).toBe('GET https://host/a/b failed: ECONNREFUSED');
    expect(err.cause).toBe(cause);
    expect(err.timedOut).toBe(false);
  });

  it('describes a timeout', () => {
    const err = new TransportError('POST', 'https://host/a/b', 'aborted', true);
    expect(err.message).toBe('POST https://host/a/b timed out');
    expect(err.timedOut).toBe(true);
  });
});

describe('HttpStatusError', () => {
  it('creates an error with response details', () => {
    const headers = new Headers({ 'retry-after': '60' });
    const err = new HttpStatusError('PUT', 'https://host/a/b', 502, headers, '{"error":"gateway"}');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('HttpStatusError');
    expect(err.status).toBe(502);
    expect(err.responseBody).toBe('{"error":"gateway"}');
    expect(err.headers.get('retry-after')).toBe('60');
    expect(err.message).toBe('PUT https://host/a/b returned 502');
  });
});

describe('ApiResponseError', () => {
  it('joins code and message pairs', () => {
    const err = new ApiResponseError([
      { code: 'err_validation', message: 'bad email' },
      { code: 'err_missing', message: 'no domain' },
    ]);
    expect(err.name).toBe('ApiResponseError');
    expect(err.errors).toHaveLength(2);
    expect(err.message).toBe('API error: err_validation: bad email; err_missing: no domain');
  });
});
