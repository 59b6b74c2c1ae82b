/**
 * Shared Application Configuration
 *
 * Centralizes environment access for the service process (HTTP trigger,
 * BullMQ worker, Redis). Module-specific settings live next to their module
 * (src/export/config.ts, src/gmail/config.ts) and follow the same pattern.
 *
 * Environment variables:
 * - APP_ENV: 'development' (default) or 'production'
 * - EXPORT_KILL_SWITCH: Set to 'true' to reject new export requests
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - PORT: HTTP server port (default 3000)
 */

import 'dotenv/config';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  server: {
    port: number;
  };
}

export function optionalEnv(key: string, fallback = ''): string {
  const value = process.env[key];
  return value === undefined || value === '' ? fallback : value;
}

/**
 * Reads an integer env var, falling back when unset or not a number.
 */
export function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const isDev = optionalEnv('APP_ENV', 'development') !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.EXPORT_KILL_SWITCH === 'true',
  redis: {
    url: process.env.REDIS_URL || undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },
  server: {
    port: intEnv('PORT', 3000),
  },
};
