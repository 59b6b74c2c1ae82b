/**
 * Checkpoint Record Helpers
 *
 * Creation, mutation, serialization and validation of CheckpointRecord.
 * Both checkpoint stores (Redis and file) persist the same JSON layout:
 *
 *   { version: 1, accountId, filterSignature, processedIds: string[],
 *     failedIds: { [id]: reason }, cursor: string | null, lastUpdated: ISO }
 *
 * parseCheckpoint is the single validation point: anything it rejects
 * surfaces as CheckpointCorruptionError, never as an empty record.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { CheckpointCorruptionError } from './errors.js';
import type { CheckpointRecord } from './types.js';

const CHECKPOINT_VERSION = 1;

const StoredCheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  accountId: z.string().min(1),
  filterSignature: z.string().min(1),
  processedIds: z.array(z.string().min(1)),
  failedIds: z.record(z.string()),
  cursor: z.string().nullable(),
  lastUpdated: z.string().datetime(),
});

type StoredCheckpoint = z.infer<typeof StoredCheckpointSchema>;

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/**
 * Short stable key for a job, safe for Redis keys, file names and BullMQ job ids.
 */
export function checkpointKey(accountId: string, filterSignature: string): string {
  return createHash('sha256')
    .update(`${accountId}\n${filterSignature}`)
    .digest('hex')
    .slice(0, 24);
}

// ---------------------------------------------------------------------------
// Record Lifecycle
// ---------------------------------------------------------------------------

export function createEmptyCheckpoint(
  accountId: string,
  filterSignature: string,
  now: Date = new Date(),
): CheckpointRecord {
  return {
    accountId,
    filterSignature,
    processedIds: new Set(),
    failedIds: new Map(),
    cursor: null,
    lastUpdated: now.toISOString(),
  };
}

/** Records a successful export; clears any earlier failure for the id */
export function markProcessed(record: CheckpointRecord, id: string): void {
  record.processedIds.add(id);
  record.failedIds.delete(id);
}

export function markFailed(record: CheckpointRecord, id: string, reason: string): void {
  record.failedIds.set(id, reason);
}

/**
 * Advances lastUpdated to `now`, unless the record already carries a later
 * timestamp (clock skew between runs or hosts).
 */
export function touchCheckpoint(record: CheckpointRecord, now: Date = new Date()): void {
  const next = now.toISOString();
  if (next > record.lastUpdated) {
    record.lastUpdated = next;
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeCheckpoint(record: CheckpointRecord): string {
  const stored: StoredCheckpoint = {
    version: CHECKPOINT_VERSION,
    accountId: record.accountId,
    filterSignature: record.filterSignature,
    processedIds: [...record.processedIds],
    failedIds: Object.fromEntries(record.failedIds),
    cursor: record.cursor,
    lastUpdated: record.lastUpdated,
  };
  return JSON.stringify(stored, null, 2);
}

/**
 * Parses and validates a stored checkpoint.
 *
 * @param location - Redis key or file path, used in the error message
 * @throws CheckpointCorruptionError on invalid JSON, schema mismatch,
 *   duplicate processed ids, or a record stored under another job's key
 */
export function parseCheckpoint(
  raw: string,
  accountId: string,
  filterSignature: string,
  location: string,
): CheckpointRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CheckpointCorruptionError(location, 'invalid JSON', { cause: err });
  }

  const result = StoredCheckpointSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new CheckpointCorruptionError(location, `${path}: ${issue.message}`, { cause: result.error });
  }

  const stored = result.data;
  if (stored.accountId !== accountId || stored.filterSignature !== filterSignature) {
    throw new CheckpointCorruptionError(location, 'record belongs to a different job');
  }

  const processedIds = new Set(stored.processedIds);
  if (processedIds.size !== stored.processedIds.length) {
    throw new CheckpointCorruptionError(location, 'processedIds contains duplicates');
  }

  return {
    accountId: stored.accountId,
    filterSignature: stored.filterSignature,
    processedIds,
    failedIds: new Map(Object.entries(stored.failedIds)),
    cursor: stored.cursor,
    lastUpdated: stored.lastUpdated,
  };
}
