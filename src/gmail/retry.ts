/**
 * Retry wrapper for Gmail API calls.
 *
 * Retries rate limits, server errors and connection drops with exponential
 * backoff (baseDelayMs, 2x, 4x, ...). Anything else is rethrown at once.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../export/errors.js';
import type { RetryPolicy } from './config.js';

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
]);

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * HTTP status of a googleapis (gaxios) error: `status`, a numeric `code`,
 * or `response.status`.
 */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;

  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('code' in err && typeof err.code === 'number') return err.code;
  if (
    'response' in err &&
    typeof err.response === 'object' &&
    err.response !== null &&
    'status' in err.response &&
    typeof err.response.status === 'number'
  ) {
    return err.response.status;
  }
  return undefined;
}

export function isTransientError(err: unknown): boolean {
  const status = httpStatusOf(err);
  if (status !== undefined) return isRetryableStatus(status);

  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return RETRYABLE_ERROR_CODES.has(err.code);
  }
  return false;
}

/**
 * Runs `operation`, retrying transient failures up to `policy.retries` times.
 *
 * @param operation - Label for logs, e.g. "messages.list"
 */
export async function withRetry<T>(
  run: () => Promise<T>,
  policy: RetryPolicy,
  operation: string,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await run();
    } catch (err) {
      if (attempt >= policy.retries || !isTransientError(err)) {
        throw err;
      }

      const delayMs = policy.baseDelayMs * 2 ** attempt;
      console.warn('[gmail] Transient API error, retrying', {
        operation,
        attempt: attempt + 1,
        of: policy.retries,
        delayMs,
        status: httpStatusOf(err),
        error: errorMessage(err),
      });
      await sleep(delayMs);
    }
  }
}
