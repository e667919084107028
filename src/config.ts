import * as dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_RECOVERIES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_WS_HOST,
  DEFAULT_WS_PORT
} from './constants.js';

/**
 * Runtime settings from the environment. Log level and timestamps are read by
 * each Logger directly (`PIXEL_BRIDGE_LOG_LEVEL`, `PIXEL_BRIDGE_LOG_TIMESTAMPS`).
 */
export interface BridgeConfig {
  /** BLE address of the display; the -a flag overrides it. */
  address: string | undefined;
  host: string;
  port: number;
  maxRetries: number;
  retryDelayMs: number;
  maxRecoveries: number;
  connectTimeoutMs: number;
}

const envNumber = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  PIXEL_BRIDGE_ADDRESS: z.string().trim().min(1).optional(),
  PIXEL_BRIDGE_WS_HOST: z.string().trim().min(1).default(DEFAULT_WS_HOST),
  PIXEL_BRIDGE_WS_PORT: envNumber(DEFAULT_WS_PORT, 0, 65535),
  PIXEL_BRIDGE_MAX_RETRIES: envNumber(DEFAULT_MAX_RETRIES, 1),
  PIXEL_BRIDGE_RETRY_DELAY_MS: envNumber(DEFAULT_RETRY_DELAY_MS, 0),
  PIXEL_BRIDGE_MAX_RECOVERIES: envNumber(DEFAULT_MAX_RECOVERIES, 0),
  PIXEL_BRIDGE_CONNECT_TIMEOUT_MS: envNumber(DEFAULT_CONNECT_TIMEOUT_MS, 1000)
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Load .env.local if it exists
export function loadEnvFile(file = path.resolve(process.cwd(), '.env.local')): void {
  dotenv.config({ path: file });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }

  const vars = parsed.data;
  return {
    address: vars.PIXEL_BRIDGE_ADDRESS,
    host: vars.PIXEL_BRIDGE_WS_HOST,
    port: vars.PIXEL_BRIDGE_WS_PORT,
    maxRetries: vars.PIXEL_BRIDGE_MAX_RETRIES,
    retryDelayMs: vars.PIXEL_BRIDGE_RETRY_DELAY_MS,
    maxRecoveries: vars.PIXEL_BRIDGE_MAX_RECOVERIES,
    connectTimeoutMs: vars.PIXEL_BRIDGE_CONNECT_TIMEOUT_MS
  };
}
