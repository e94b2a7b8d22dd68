/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  ClientSettingsSchema,
  RetrySettingsSchema,
  TransportSettingsSchema,
} from './schema.js';

/** Fully validated config file. */
export type Config = z.infer<typeof ConfigSchema>;

/** Base URL / region and credentials. */
export type ClientSettings = z.infer<typeof ClientSettingsSchema>;

/** Orchestrator retry settings after defaults are applied. */
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

/** Orchestrator retry settings as accepted from callers; every field optional. */
export type RetrySettingsInput = z.input<typeof RetrySettingsSchema>;

/** Transport low-level retry and timeout settings. */
export type TransportSettings = z.infer<typeof TransportSettingsSchema>;

// Re-export schemas for convenience
export {
  ConfigSchema,
  ClientSettingsSchema,
  RetrySettingsSchema,
  TransportSettingsSchema,
} from './schema.js';
