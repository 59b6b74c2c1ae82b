/**
 * Export Engine: Resumable Batch Export
 *
 * Drives one job (account + filter) through its item source:
 *
 *   for each page (source order):
 *     for each item (page order):
 *       1. stop if the count limit is reached or cancellation was requested
 *       2. skip ids already in processedIds (id-based, not positional)
 *       3. process -> write artifact -> mark processed -> save checkpoint
 *       4. on failure: record id + reason in failedIds -> save -> continue
 *     advance the cursor to the next page -> save
 *
 * Durability: the checkpoint is saved after the artifact is written, so a
 * crash in between re-exports at most one item on resume and never drops one.
 *
 * Modes:
 * - fresh: clear the job's checkpoint, start at the source's natural start
 * - resume: load the checkpoint (empty if none), continue from its cursor
 * - start-from N: begin at message N (1-based), keep processedIds
 *
 * Fatal errors (page fetch, checkpoint load/save) end the run with a
 * `failed` summary instead of throwing; item errors never end it.
 * Everything already saved stays resumable.
 *
 * Single worker: one item at a time. Callers must not run the same job
 * concurrently (the BullMQ worker serializes by job id).
 */

import {
  createEmptyCheckpoint,
  markFailed,
  markProcessed,
  touchCheckpoint,
} from './checkpoint.js';
import {
  CheckpointStoreError,
  ExportError,
  SourceExhaustionError,
  errorMessage,
} from './errors.js';
import { describeFilter, filterSignature } from './filter.js';
import { notifyProgress } from './progress.js';
import type {
  CheckpointRecord,
  ExportDependencies,
  ExportRequest,
  ItemFailure,
  RunCounters,
  RunStatus,
  RunSummary,
  SourceItem,
  SourcePage,
  SourcePosition,
} from './types.js';

type StopStatus = Exclude<RunStatus, 'failed'>;

function emptyCounters(): RunCounters {
  return {
    totalSeen: 0,
    totalExported: 0,
    totalSkippedDuplicate: 0,
    totalFailed: 0,
    totalInspected: 0,
  };
}

/**
 * Run (or continue) an export job.
 *
 * Resolves with a RunSummary for every outcome, including fatal source and
 * checkpoint errors. Rejects only on an invalid request (bad filter, count
 * limit or start-from position).
 */
export async function runExport<A>(
  request: ExportRequest,
  deps: ExportDependencies<A>,
): Promise<RunSummary> {
  const { accountId, filter, mode, signal } = request;
  const now = deps.now ?? (() => new Date());
  const createArtifact = request.options?.createArtifact ?? true;
  const countLimit = request.options?.countLimit;

  if (countLimit !== undefined && (!Number.isInteger(countLimit) || countLimit < 1)) {
    throw new RangeError(`countLimit must be a positive integer, got ${countLimit}`);
  }
  if (mode.type === 'start-from' && (!Number.isInteger(mode.position) || mode.position < 1)) {
    throw new RangeError(`start-from position must be a positive integer, got ${mode.position}`);
  }

  const signature = filterSignature(filter);
  const startedAt = now();
  const counters = emptyCounters();
  const failures: ItemFailure[] = [];
  let estimatedTotal: number | undefined;
  let record: CheckpointRecord = createEmptyCheckpoint(accountId, signature, startedAt);
  // Inspection runs never save, so track how far they got separately
  let inspectionCursor: string | null = null;

  console.log('[export] Run starting', {
    accountId,
    filter: describeFilter(filter),
    mode: mode.type,
    countLimit: countLimit ?? null,
    createArtifact,
  });

  // -------------------------------------------------------------------------
  // Store & source calls (errors normalized to the export taxonomy)
  // -------------------------------------------------------------------------

  async function callStore<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof ExportError) throw err;
      throw new CheckpointStoreError(`Checkpoint ${action} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function persist(): Promise<void> {
    touchCheckpoint(record, now());
    await callStore('save', () => deps.store.save(record));
  }

  async function fetchPage(position: SourcePosition): Promise<SourcePage> {
    try {
      return await deps.source.nextPage(position, filter);
    } catch (err) {
      if (err instanceof SourceExhaustionError) throw err;
      throw new SourceExhaustionError(`Failed to fetch next page: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function openCheckpoint(): Promise<CheckpointRecord> {
    if (mode.type === 'fresh') {
      if (createArtifact) {
        await callStore('clear', () => deps.store.clear(accountId, signature));
      }
      return createEmptyCheckpoint(accountId, signature, now());
    }
    return callStore('load', () => deps.store.load(accountId, signature));
  }

  // -------------------------------------------------------------------------
  // Driver loop
  // -------------------------------------------------------------------------

  function limitReached(): boolean {
    if (countLimit === undefined) return false;
    const handled = createArtifact ? counters.totalExported : counters.totalInspected;
    return handled >= countLimit;
  }

  function report(event: 'item' | 'page'): void {
    notifyProgress(deps.reporter, { event, ...counters, estimatedTotal });
  }

  async function handleItem(item: SourceItem): Promise<void> {
    counters.totalSeen++;

    if (record.processedIds.has(item.id)) {
      counters.totalSkippedDuplicate++;
      return;
    }

    if (!createArtifact) {
      counters.totalInspected++;
      return;
    }

    try {
      const artifact = await deps.processor.process(item);
      await deps.writer.write(artifact);
      markProcessed(record, item.id);
      counters.totalExported++;
    } catch (err) {
      const reason = errorMessage(err);
      markFailed(record, item.id, reason);
      failures.push({ id: item.id, reason });
      counters.totalFailed++;
      console.warn('[export] Item failed, continuing', { id: item.id, reason });
    }

    await persist();
  }

  async function drive(): Promise<StopStatus> {
    let position: SourcePosition =
      mode.type === 'start-from'
        ? { type: 'offset', offset: mode.position - 1 }
        : { type: 'cursor', cursor: record.cursor };

    for (;;) {
      if (limitReached()) return 'limit_reached';
      if (signal?.aborted) return 'cancelled';

      const page = await fetchPage(position);
      if (page.estimatedTotal !== undefined) {
        estimatedTotal = page.estimatedTotal;
      }

      for (const item of page.items) {
        if (limitReached()) return 'limit_reached';
        if (signal?.aborted) return 'cancelled';
        await handleItem(item);
        report('item');
      }

      if (createArtifact) {
        record.cursor = page.nextCursor;
        await persist();
      } else {
        inspectionCursor = page.nextCursor;
      }
      report('page');

      if (page.nextCursor === null) return 'completed';
      position = { type: 'cursor', cursor: page.nextCursor };
    }
  }

  // -------------------------------------------------------------------------
  // Summary
  // -------------------------------------------------------------------------

  function finish(status: RunStatus, error?: ExportError): RunSummary {
    const finishedAt = now();
    const summary: RunSummary = {
      accountId,
      filterSignature: signature,
      mode: mode.type,
      status,
      counters: { ...counters },
      estimatedTotal,
      failures: [...failures],
      cursor: createArtifact ? record.cursor : inspectionCursor,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      ...(error && { error: { code: error.code, message: error.message } }),
    };

    if (error) {
      console.error('[export] Run failed', { accountId, code: error.code, error: error.message, ...counters });
    } else {
      console.log('[export] Run finished', { accountId, status, ...counters });
    }
    return summary;
  }

  try {
    record = await openCheckpoint();
    if (mode.type === 'resume' && record.processedIds.size > 0) {
      console.log('[export] Resuming from checkpoint', {
        accountId,
        processed: record.processedIds.size,
        failed: record.failedIds.size,
        hasCursor: record.cursor !== null,
      });
    }

    const status = await drive();
    if (status === 'cancelled' && createArtifact) {
      await persist();
    }
    return finish(status);
  } catch (err) {
    if (err instanceof ExportError) {
      return finish('failed', err);
    }
    throw err;
  }
}
