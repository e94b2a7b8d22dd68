/**
 * Command-line front end: load config, send one request, print the body.
 * Kept separate from the bin entry so it can be driven from tests.
 */

import { parseArgs } from 'node:util';
import { ApiClient } from '../client/api-client.js';
import type { ApiClientOptions } from '../client/api-client.js';
import { listRegions } from '../client/regions.js';
import { loadConfig, resolveConfigPath } from '../config/loader.js';
import {
  ConfigError,
  HttpStatusError,
  RateLimitExceededError,
  TransportError,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { HTTP_METHODS } from '../transport/types.js';
import type { HttpMethod } from '../transport/types.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Overrides applied when building the client (transport, sleep). */
  clientOverrides?: Partial<ApiClientOptions>;
}

export const USAGE = `
mcapi - rate-limit-aware Mimecast API client

Usage:
  mcapi [options] <METHOD> <path>

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -r, --region <code>   Region code, overrides the config file
  -d, --data <json>     JSON request body
  --regions             List region codes and exit
  -h, --help            Show this help message

Examples:
  mcapi GET /api/account/get-account
  mcapi --region eu POST /api/domain/get-internal-domain --data '{"data":[]}'
`;

function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

/** Run the CLI and return the process exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 2;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  if (values.regions) {
    for (const [code, description] of Object.entries(listRegions())) {
      io.stdout(`${code.padEnd(4)} ${description}\n`);
    }
    return 0;
  }

  const [rawMethod, path] = positionals;
  if (!rawMethod || !path) {
    io.stderr(USAGE);
    return 2;
  }
  const method = rawMethod.toUpperCase();
  if (!isHttpMethod(method)) {
    io.stderr(`Error: unsupported method "${rawMethod}"\n`);
    return 2;
  }

  let json: unknown;
  if (values.data !== undefined) {
    try {
      json = JSON.parse(values.data);
    } catch {
      io.stderr('Error: --data is not valid JSON\n');
      return 2;
    }
  }

  try {
    const config = loadConfig(resolveConfigPath(values.config, io.env));
    logger.level = config.logLevel;

    const client = ApiClient.fromConfig(config, {
      ...(values.region !== undefined && { region: values.region, baseUrl: undefined }),
      ...io.clientOverrides,
    });
    const response = await client.request(method, path, { json });
    io.stdout(`${await response.text()}\n`);
    return 0;
  } catch (err) {
    return reportError(err, io);
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      region: { type: 'string', short: 'r' },
      data: { type: 'string', short: 'd' },
      regions: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
}

function reportError(err: unknown, io: CliIO): number {
  if (err instanceof ConfigError) {
    io.stderr(`Config error: ${err.message}\n`);
    return 1;
  }
  if (err instanceof RateLimitExceededError) {
    io.stderr(`Rate limited: ${err.message}\n`);
    return 3;
  }
  if (err instanceof HttpStatusError) {
    io.stderr(`Request failed with status ${err.status}: ${err.responseBody}\n`);
    return 4;
  }
  if (err instanceof TransportError) {
    io.stderr(`Network error: ${err.message}\n`);
    return 5;
  }
  io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  return 1;
}
