/**
 * BullMQ Export Worker
 *
 * Runs queued export jobs through the engine, one at a time.
 *
 * Design:
 * - processExportJob is extracted as a named function for testability
 * - Worker uses lazy singleton pattern (same as queue.ts)
 * - Concurrency 1: a job key is never exported by two runs at once
 * - A retried attempt of a `fresh` job runs as `resume`, so the retry keeps
 *   the progress the failed attempt saved
 *
 * Failure handling:
 * - A `failed` run throws, so BullMQ retries it with backoff (queue.ts)
 * - A run cancelled by shutdown also throws; its retry resumes from the
 *   checkpoint once a worker is back
 * - Failed jobs are preserved for manual review (dead-letter pattern)
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { appConfig } from '../config.js';
import { runExport } from '../export/engine.js';
import { exportConfig } from '../export/config.js';
import { ExportError } from '../export/errors.js';
import { describeFilter } from '../export/filter.js';
import { ConsoleProgressReporter } from '../export/progress.js';
import type { RunMode } from '../export/types.js';
import { buildGmailExportDependencies, getCheckpointStore } from '../wiring.js';
import { EXPORT_QUEUE_NAME, createRedisConnection } from './queue.js';
import { ExportJobDataSchema } from './types.js';
import type { ExportJobData, ExportJobResult } from './types.js';

/** The parts of a BullMQ job the processor reads */
export type ExportJob = Pick<Job<ExportJobData, ExportJobResult>, 'id' | 'data' | 'attemptsMade'>;

let _worker: Worker<ExportJobData, ExportJobResult> | null = null;
let _shutdown: AbortController | null = null;

/**
 * Run one export job.
 *
 * Exported for testing (allows calling without BullMQ Worker infrastructure).
 *
 * @param signal - Aborted on shutdown; the engine stops at the next item boundary
 * @throws ExportError when the run fails, Error when it was cancelled
 */
export async function processExportJob(
  job: ExportJob,
  signal?: AbortSignal,
): Promise<ExportJobResult> {
  const data = ExportJobDataSchema.parse(job.data);
  const mode: RunMode = data.mode.type === 'fresh' && job.attemptsMade > 0 ? { type: 'resume' } : data.mode;

  console.log(`[export-worker] Processing job ${job.id}`, {
    accountId: data.accountId,
    filter: describeFilter(data.filter),
    mode: mode.type,
    attempt: job.attemptsMade + 1,
  });

  if (appConfig.killSwitch) {
    throw new Error('Export disabled by kill switch');
  }

  const deps = buildGmailExportDependencies({
    accountId: data.accountId,
    outputDir: data.outputDir,
    store: getCheckpointStore(),
    reporter: new ConsoleProgressReporter(exportConfig.progressLogEvery),
  });

  const summary = await runExport(
    {
      accountId: data.accountId,
      filter: data.filter,
      mode,
      options: { countLimit: data.countLimit, createArtifact: data.createArtifact },
      signal,
    },
    deps,
  );

  if (summary.error) {
    throw new ExportError(summary.error.message, summary.error.code);
  }
  if (summary.status === 'cancelled') {
    throw new Error('Export cancelled before finishing; progress saved for the next attempt');
  }
  return summary;
}

/**
 * Create and start the export worker.
 */
export function createExportWorker(): Worker<ExportJobData, ExportJobResult> {
  if (_worker) return _worker;

  const shutdown = new AbortController();
  _shutdown = shutdown;

  _worker = new Worker<ExportJobData, ExportJobResult>(
    EXPORT_QUEUE_NAME,
    (job) => processExportJob(job, shutdown.signal),
    {
      connection: createRedisConnection(),
      concurrency: 1,
    },
  );

  _worker.on('completed', (job, result) => {
    console.log(`[export-worker] Job ${job.id} completed`, {
      accountId: job.data.accountId,
      status: result.status,
      exported: result.counters.totalExported,
      failed: result.counters.totalFailed,
    });
  });

  _worker.on('failed', (job, err) => {
    console.error(`[export-worker] Job ${job?.id} failed`, {
      accountId: job?.data.accountId,
      error: err.message,
      attempt: job?.attemptsMade,
      maxAttempts: job?.opts.attempts,
    });
    if (job && job.attemptsMade >= (job.opts.attempts ?? 1)) {
      console.error(`[export-worker] Job ${job.id} exhausted all retries: now in dead-letter`, {
        accountId: job.data.accountId,
      });
    }
  });

  console.log('[export-worker] Started, listening for jobs on queue:', EXPORT_QUEUE_NAME);
  return _worker;
}

/**
 * Close the worker for graceful shutdown.
 *
 * Asks the running export to stop at the next item boundary, waits for it
 * to save its checkpoint, then stops accepting jobs.
 */
export async function closeExportWorker(): Promise<void> {
  _shutdown?.abort();
  _shutdown = null;

  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
