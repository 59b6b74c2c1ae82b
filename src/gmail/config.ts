/**
 * Gmail Source Configuration
 *
 * Environment variables:
 * - GMAIL_PAGE_SIZE: messages.list page size (default 100, clamped to 1..500)
 * - GMAIL_MAX_RETRIES: Retries after the first attempt for transient API errors (default 3)
 * - GMAIL_RETRY_BASE_DELAY_MS: First retry delay, doubled per retry (default 1000)
 *
 * Credentials (GOOGLE_*) are read by gmail-client.ts.
 */

import 'dotenv/config';
import { intEnv } from '../config.js';

/** Gmail's maximum maxResults for users.messages.list */
export const GMAIL_MAX_PAGE_SIZE = 500;

export interface RetryPolicy {
  /** Retries after the first attempt */
  retries: number;
  baseDelayMs: number;
}

export interface GmailConfig {
  pageSize: number;
  retry: RetryPolicy;
}

export function clampPageSize(value: number): number {
  return Math.min(GMAIL_MAX_PAGE_SIZE, Math.max(1, Math.floor(value)));
}

export const gmailConfig: GmailConfig = {
  pageSize: clampPageSize(intEnv('GMAIL_PAGE_SIZE', 100)),
  retry: {
    retries: Math.max(0, intEnv('GMAIL_MAX_RETRIES', 3)),
    baseDelayMs: Math.max(0, intEnv('GMAIL_RETRY_BASE_DELAY_MS', 1000)),
  },
};
