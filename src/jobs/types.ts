/**
 * Export Job Type Definitions
 *
 * ExportJobData is what the HTTP trigger enqueues and the worker consumes.
 * It is validated with zod on both sides: on enqueue, and again in the
 * worker, since a job may have been written by an older deployment.
 */

import { z } from 'zod';
import { FilterSpecSchema } from '../export/filter.js';
import type { RunSummary } from '../export/types.js';

export const RunModeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('fresh') }),
  z.object({ type: z.literal('resume') }),
  z.object({ type: z.literal('start-from'), position: z.number().int().positive() }),
]);

export const ExportJobDataSchema = z.object({
  accountId: z.string().trim().min(1),
  filter: FilterSpecSchema,
  mode: RunModeSchema,
  countLimit: z.number().int().positive().optional(),
  createArtifact: z.boolean(),
  /** Overrides EXPORT_OUTPUT_DIR for this job */
  outputDir: z.string().trim().min(1).optional(),
  requestedAt: z.string().datetime(),
});

export type ExportJobData = z.infer<typeof ExportJobDataSchema>;

/** A job's return value is the run summary */
export type ExportJobResult = RunSummary;
