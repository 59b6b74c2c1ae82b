/**
 * Export Configuration
 *
 * Environment variables:
 * - EXPORT_OUTPUT_DIR: Where artifact files are written (default ./context)
 * - CHECKPOINT_BACKEND: 'redis' (default) or 'file'
 * - CHECKPOINT_DIR: Directory for the file backend (default ./.checkpoints)
 * - PROGRESS_LOG_EVERY: Log a progress line every N items (default 10)
 */

import 'dotenv/config';
import { intEnv, optionalEnv } from '../config.js';

export type CheckpointBackend = 'redis' | 'file';

export interface ExportConfig {
  outputDir: string;
  checkpointBackend: CheckpointBackend;
  checkpointDir: string;
  progressLogEvery: number;
}

function parseBackend(value: string): CheckpointBackend {
  if (value === 'redis' || value === 'file') return value;
  console.warn('[export] Unknown CHECKPOINT_BACKEND, using redis', { value });
  return 'redis';
}

export const exportConfig: ExportConfig = {
  outputDir: optionalEnv('EXPORT_OUTPUT_DIR', './context'),
  checkpointBackend: parseBackend(optionalEnv('CHECKPOINT_BACKEND', 'redis')),
  checkpointDir: optionalEnv('CHECKPOINT_DIR', './.checkpoints'),
  progressLogEvery: Math.max(1, intEnv('PROGRESS_LOG_EVERY', 10)),
};
