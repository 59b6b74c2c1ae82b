/**
 * BullMQ Queue Configuration
 *
 * Manages the mailbox export queue with:
 * - One job per export job key (jobId = export-{checkpointKey}), so a job
 *   cannot be queued twice while it is waiting or running
 * - Exponential backoff retry (3 attempts: 30s, 60s, 120s); retries resume
 *   from the checkpoint
 * - 24h completed job retention
 * - Failed job preservation for manual review (dead-letter pattern)
 *
 * Uses lazy singleton pattern: queue is not created until first access.
 * This prevents Redis connections during module import (breaks tests).
 */

import { Queue } from 'bullmq';
import { appConfig } from '../config.js';
import { checkpointKey } from '../export/checkpoint.js';
import type { ExportJobData, ExportJobResult } from './types.js';

export const EXPORT_QUEUE_NAME = 'mailbox-export';

/** Redis connection config shape for BullMQ and ioredis */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: number | null;
}

/**
 * Parse a Redis URL into a connection config object.
 *
 * Supports redis:// and rediss:// (TLS) URL formats.
 */
function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * Create a Redis connection config.
 *
 * If REDIS_URL is set, parses it into host/port/password components.
 * Otherwise uses individual REDIS_HOST/PORT/PASSWORD env vars.
 *
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

/** BullMQ job id for an export job (BullMQ reserves ':') */
export function exportJobId(accountId: string, filterSignature: string): string {
  return `export-${checkpointKey(accountId, filterSignature)}`;
}

// Lazy singleton: don't connect at import time
let _queue: Queue<ExportJobData, ExportJobResult> | null = null;

/**
 * Get the singleton export queue instance.
 */
export function getExportQueue(): Queue<ExportJobData, ExportJobResult> {
  if (!_queue) {
    _queue = new Queue<ExportJobData, ExportJobResult>(EXPORT_QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 30000, // 30s, 60s, 120s
        },
        removeOnComplete: { age: 86400 },
        removeOnFail: false, // Dead-letter: keep failed jobs for manual review
      },
    });
  }
  return _queue;
}

/**
 * Close the queue connection for graceful shutdown.
 * Resets the singleton so a new connection can be created if needed.
 */
export async function closeExportQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
