/**
 * File Checkpoint Store: local backend for CLI runs without Redis
 *
 * One JSON file per job: `{dir}/{checkpointKey}.json`.
 *
 * save() writes a temp file in the same directory, fsyncs it, then renames
 * it over the target. rename() within one filesystem is atomic, so a crash
 * leaves either the previous record or the new one, never a torn file.
 */

import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { checkpointKey, createEmptyCheckpoint, parseCheckpoint, serializeCheckpoint } from './checkpoint.js';
import { CheckpointStoreError, errorMessage } from './errors.js';
import type { CheckpointRecord, CheckpointStore } from './types.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await rm(tempPath, { force: true });
  } catch (err) {
    console.warn('[checkpoint] Could not remove temp file', { tempPath, error: errorMessage(err) });
  }
}

export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly dir: string) {}

  /** Path of the checkpoint file for a job */
  pathFor(accountId: string, filterSignature: string): string {
    return join(this.dir, `${checkpointKey(accountId, filterSignature)}.json`);
  }

  async load(accountId: string, filterSignature: string): Promise<CheckpointRecord> {
    const path = this.pathFor(accountId, filterSignature);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return createEmptyCheckpoint(accountId, filterSignature);
      }
      throw new CheckpointStoreError(`Failed to read checkpoint ${path}: ${errorMessage(err)}`, { cause: err });
    }

    return parseCheckpoint(raw, accountId, filterSignature, path);
  }

  async save(record: CheckpointRecord): Promise<void> {
    const path = this.pathFor(record.accountId, record.filterSignature);
    const tempPath = `${path}.${randomUUID()}.tmp`;

    try {
      await mkdir(this.dir, { recursive: true });
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(serializeCheckpoint(record), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, path);
    } catch (err) {
      await removeTempFile(tempPath);
      throw new CheckpointStoreError(`Failed to write checkpoint ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async clear(accountId: string, filterSignature: string): Promise<void> {
    const path = this.pathFor(accountId, filterSignature);
    try {
      await rm(path, { force: true });
    } catch (err) {
      throw new CheckpointStoreError(`Failed to clear checkpoint ${path}: ${errorMessage(err)}`, { cause: err });
    }
    console.log('[checkpoint] Cleared checkpoint file', { path });
  }
}
