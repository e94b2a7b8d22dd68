/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema,
 * and returns a fully typed Config object or throws a ConfigError.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @returns A fully validated Config object
 * @throws ConfigError if the file is missing, unreadable, or fails validation
 */
export function loadConfig(path: string): Config {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  logger.debug(
    { configPath: path, maxRetries: result.data.retry.maxRetries, transportRetries: result.data.transport.retries },
    'Config loaded successfully',
  );

  return result.data;
}

/**
 * Resolve the config file path.
 *
 * Priority:
 * 1. explicit path (from --config)
 * 2. MCAPI_CONFIG environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) {
    return explicit;
  }

  const envPath = env['MCAPI_CONFIG'];
  if (envPath) {
    return envPath;
  }

  return DEFAULT_CONFIG_PATH;
}
