/**
 * Express Export Trigger
 *
 * HTTP layer for starting and inspecting export jobs. Routes:
 * - GET /health: Server status and kill switch state
 * - POST /exports: Validate the request, enqueue an export job
 * - POST /exports/status: Checkpoint and queue state for one job
 *
 * POST /exports:
 * 1. Checks kill switch (returns 503 if active)
 * 2. Validates the body (accountId, filter, mode, countLimit, createArtifact)
 * 3. Rejects with 409 while the same job is waiting, delayed or running
 * 4. Removes a finished job with the same id (clears BullMQ's dedup),
 *    logging the failure reason first when it is a failed job
 * 5. Enqueues with jobId = export-{checkpointKey}, returns 202
 *
 * Message content is never logged; ids and counts are.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { appConfig } from '../config.js';
import { ExportError } from '../export/errors.js';
import { FilterSpecSchema, describeFilter, filterSignature } from '../export/filter.js';
import { exportJobId, getExportQueue } from '../jobs/queue.js';
import { RunModeSchema } from '../jobs/types.js';
import type { ExportJobData } from '../jobs/types.js';
import { getCheckpointStore } from '../wiring.js';
import { healthHandler } from './health.js';

// ---------------------------------------------------------------------------
// Request Schemas
// ---------------------------------------------------------------------------

const JobKeySchema = z.object({
  accountId: z.string().trim().min(1),
  filter: FilterSpecSchema.default({ kind: 'unread' }),
});

export const ExportRequestBodySchema = JobKeySchema.extend({
  mode: RunModeSchema.default({ type: 'resume' }),
  countLimit: z.number().int().positive().optional(),
  createArtifact: z.boolean().default(true),
  outputDir: z.string().trim().min(1).optional(),
});

/** Job states in which a second request for the same job is rejected */
const IN_PROGRESS_STATES = new Set(['active', 'waiting', 'waiting-children', 'delayed', 'prioritized']);

function validationDetails(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * without shared state between test cases.
 */
export function createApp() {
  const app = express();
  app.use(express.json());

  app.get('/health', healthHandler);

  app.post('/exports', async (req: Request, res: Response, next: NextFunction) => {
    if (appConfig.killSwitch) {
      console.log('[server] Kill switch active: rejecting export request');
      res.status(503).json({ message: 'Export disabled' });
      return;
    }

    const parsed = ExportRequestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid export request', details: validationDetails(parsed.error) });
      return;
    }

    const body = parsed.data;
    const jobId = exportJobId(body.accountId, filterSignature(body.filter));

    try {
      const queue = getExportQueue();

      const existing = await queue.getJob(jobId);
      if (existing) {
        const state = await existing.getState();
        if (IN_PROGRESS_STATES.has(state)) {
          res.status(409).json({ error: 'Export already queued or running', jobId, state });
          return;
        }
        if (state === 'failed') {
          // Dead-letter record is about to go; keep its reason in the logs
          console.warn('[server] Replacing failed job', {
            jobId,
            failedReason: existing.failedReason,
            attemptsMade: existing.attemptsMade,
            finishedOn: existing.finishedOn ?? null,
          });
        }
        await existing.remove();
        console.log('[server] Removed finished job', { jobId, state });
      }

      const jobData: ExportJobData = {
        ...body,
        requestedAt: new Date().toISOString(),
      };
      await queue.add('export', jobData, { jobId });

      console.log('[server] Enqueued export', {
        jobId,
        accountId: body.accountId,
        filter: describeFilter(body.filter),
        mode: body.mode.type,
      });
      res.status(202).json({ accepted: true, jobId });
    } catch (err) {
      next(err);
    }
  });

  app.post('/exports/status', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = JobKeySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid status request', details: validationDetails(parsed.error) });
      return;
    }

    const { accountId, filter } = parsed.data;
    const signature = filterSignature(filter);
    const jobId = exportJobId(accountId, signature);

    try {
      const record = await getCheckpointStore().load(accountId, signature);
      const job = await getExportQueue().getJob(jobId);
      const state = job ? await job.getState() : null;
      const started = record.processedIds.size > 0 || record.failedIds.size > 0 || record.cursor !== null;

      res.json({
        jobId,
        state,
        filterSignature: signature,
        processed: record.processedIds.size,
        failed: Object.fromEntries(record.failedIds),
        cursor: record.cursor,
        lastUpdated: started ? record.lastUpdated : null,
      });
    } catch (err) {
      if (err instanceof ExportError) {
        console.error('[server] Checkpoint unavailable', { jobId, code: err.code, error: err.message });
        res.status(500).json({ error: err.message, code: err.code });
        return;
      }
      next(err);
    }
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
