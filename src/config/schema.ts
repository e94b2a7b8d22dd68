/**
 * Zod schemas for the YAML config file and for constructor options.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';
import { HTTP_METHODS } from '../transport/types.js';

/** Upper bound for a single backoff wait. */
export const MAX_BACKOFF_MS = 24 * 60 * 60 * 1000;

/** Orchestrator retry settings, immutable once an orchestrator is built. */
export const RetrySettingsSchema = z
  .object({
    maxRetries: z.number().int().min(0, { message: 'maxRetries must not be negative' }).default(3),
    minBackoffMs: z.number().positive({ message: 'minBackoffMs must be positive' }).default(1000),
    maxBackoffMs: z
      .number()
      .positive({ message: 'maxBackoffMs must be positive' })
      .max(MAX_BACKOFF_MS, { message: 'maxBackoffMs must not exceed 24 hours' })
      .default(60_000),
    jitter: z.boolean().default(true),
  })
  .refine((s) => s.maxBackoffMs >= s.minBackoffMs, {
    message: 'maxBackoffMs must be greater than or equal to minBackoffMs',
  });

/** Settings for the transport's own low-level retry layer. */
export const TransportSettingsSchema = z.object({
  timeoutMs: z.number().int().min(1).default(30_000),
  retries: z.number().int().min(0).default(0),
  backoffFactorMs: z.number().min(0).default(500),
  statusForcelist: z
    .array(z.number().int().min(100).max(599))
    .default([429, 500, 502, 503, 504]),
  allowedMethods: z.array(z.enum(HTTP_METHODS)).default([...HTTP_METHODS]),
});

/** Where requests go and how they authenticate. */
export const ClientSettingsSchema = z
  .object({
    baseUrl: z.url({ message: 'client.baseUrl must be a valid URL' }).optional(),
    region: z.string().min(1).optional(),
    token: z.string().min(1, { message: 'client.token must not be empty' }),
  })
  .refine((c) => !(c.baseUrl && c.region), {
    message: 'client.baseUrl and client.region are mutually exclusive',
  });

/** Top-level config file schema. */
export const ConfigSchema = z.object({
  version: z.literal(1),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  client: ClientSettingsSchema,
  retry: RetrySettingsSchema.default({
    maxRetries: 3,
    minBackoffMs: 1000,
    maxBackoffMs: 60_000,
    jitter: true,
  }),
  transport: TransportSettingsSchema.default({
    timeoutMs: 30_000,
    retries: 0,
    backoffFactorMs: 500,
    statusForcelist: [429, 500, 502, 503, 504],
    allowedMethods: [...HTTP_METHODS],
  }),
});
