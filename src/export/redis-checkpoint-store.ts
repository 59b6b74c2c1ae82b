/**
 * Redis Checkpoint Store: default checkpoint backend
 *
 * Each job's record is one JSON string under
 * `export:checkpoint:{checkpointKey}`. A single SET replaces the whole value,
 * so a crash during save leaves either the old or the new record readable.
 *
 * The connection is a lazy singleton per store (same pattern as the BullMQ
 * queue), created on first use so importing this module never connects.
 * Unlike the BullMQ connection, commands give up after a few retries so an
 * unreachable Redis fails the run instead of hanging it.
 */

import { Redis as IORedis } from 'ioredis';
import { createRedisConnection } from '../jobs/queue.js';
import { checkpointKey, createEmptyCheckpoint, parseCheckpoint, serializeCheckpoint } from './checkpoint.js';
import { CheckpointStoreError, errorMessage } from './errors.js';
import type { CheckpointRecord, CheckpointStore } from './types.js';

/** The subset of the ioredis client this store uses */
export interface CheckpointRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export function checkpointRedisKey(accountId: string, filterSignature: string): string {
  return `export:checkpoint:${checkpointKey(accountId, filterSignature)}`;
}

export class RedisCheckpointStore implements CheckpointStore {
  private client: CheckpointRedisClient | null;

  constructor(client?: CheckpointRedisClient) {
    this.client = client ?? null;
  }

  private getClient(): CheckpointRedisClient {
    if (!this.client) {
      this.client = new IORedis({ ...createRedisConnection(), maxRetriesPerRequest: 3 });
    }
    return this.client;
  }

  async load(accountId: string, filterSignature: string): Promise<CheckpointRecord> {
    const key = checkpointRedisKey(accountId, filterSignature);

    let raw: string | null;
    try {
      raw = await this.getClient().get(key);
    } catch (err) {
      throw new CheckpointStoreError(`Failed to read checkpoint ${key}: ${errorMessage(err)}`, { cause: err });
    }

    if (raw === null) {
      return createEmptyCheckpoint(accountId, filterSignature);
    }
    return parseCheckpoint(raw, accountId, filterSignature, key);
  }

  async save(record: CheckpointRecord): Promise<void> {
    const key = checkpointRedisKey(record.accountId, record.filterSignature);
    try {
      await this.getClient().set(key, serializeCheckpoint(record));
    } catch (err) {
      throw new CheckpointStoreError(`Failed to write checkpoint ${key}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async clear(accountId: string, filterSignature: string): Promise<void> {
    const key = checkpointRedisKey(accountId, filterSignature);
    try {
      const removed = await this.getClient().del(key);
      if (removed > 0) {
        console.log('[checkpoint] Cleared Redis checkpoint', { key });
      }
    } catch (err) {
      throw new CheckpointStoreError(`Failed to clear checkpoint ${key}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Quit the Redis connection for graceful shutdown */
  async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }
}
