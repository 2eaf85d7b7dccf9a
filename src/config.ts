/**
 * config.ts — Client configuration from environment variables.
 *
 *   DIGITALOCEAN_ACCESS_TOKEN            required
 *   DIGITALOCEAN_API_URL                 default https://api.digitalocean.com
 *   DIGITALOCEAN_REQUEST_TIMEOUT_MS      default 30000
 *   DIGITALOCEAN_MAX_CONCURRENT_REQUESTS default 5
 *   LOG_LEVEL                            default info
 *
 * When reading process.env, a .env file in the working directory is loaded first.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { CloudClient, REST_SERVER } from './client/CloudClient.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './client/transport.js';
import type { HttpTransport } from './client/types.js';
import { createLogger } from './logger.js';

const EnvSchema = z.object({
  DIGITALOCEAN_ACCESS_TOKEN: z
    .string({ required_error: 'DIGITALOCEAN_ACCESS_TOKEN is required' })
    .trim()
    .min(1, 'DIGITALOCEAN_ACCESS_TOKEN may not be empty'),
  DIGITALOCEAN_API_URL: z.string().url().default(REST_SERVER),
  DIGITALOCEAN_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  DIGITALOCEAN_MAX_CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(5),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface CloudConfig {
  accessToken: string;
  baseUrl: string;
  requestTimeoutMs: number;
  maxConcurrentRequests: number;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CloudConfig {
  if (env === process.env) loadDotenv();
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const data = parsed.data;
  return {
    accessToken: data.DIGITALOCEAN_ACCESS_TOKEN,
    baseUrl: data.DIGITALOCEAN_API_URL,
    requestTimeoutMs: data.DIGITALOCEAN_REQUEST_TIMEOUT_MS,
    maxConcurrentRequests: data.DIGITALOCEAN_MAX_CONCURRENT_REQUESTS,
    logLevel: data.LOG_LEVEL,
  };
}

export function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  transport?: HttpTransport,
): CloudClient {
  const config = loadConfig(env);
  const log = createLogger('client');
  log.level = config.logLevel;
  return new CloudClient({
    accessToken: config.accessToken,
    baseUrl: config.baseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    maxConcurrentRequests: config.maxConcurrentRequests,
    logger: log,
    ...(transport !== undefined && { transport }),
  });
}
