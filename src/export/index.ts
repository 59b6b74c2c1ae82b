/**
 * Export Module: Barrel Export
 *
 * Public API for the resumable export engine.
 *
 * Usage:
 *   import { runExport, FileCheckpointStore } from './export/index.js';
 *   const summary = await runExport(request, { source, processor, writer, store });
 */

// Engine
export { runExport } from './engine.js';

// Filters
export { FilterSpecSchema, filterSignature, describeFilter } from './filter.js';
export type { FilterSpec, FilterKind } from './filter.js';

// Checkpoints
export {
  checkpointKey,
  createEmptyCheckpoint,
  markProcessed,
  markFailed,
  touchCheckpoint,
  serializeCheckpoint,
  parseCheckpoint,
} from './checkpoint.js';
export { RedisCheckpointStore, checkpointRedisKey } from './redis-checkpoint-store.js';
export type { CheckpointRedisClient } from './redis-checkpoint-store.js';
export { FileCheckpointStore } from './file-checkpoint-store.js';

// Progress & summary
export { ConsoleProgressReporter, formatProgressLine, notifyProgress } from './progress.js';
export { formatRunSummary } from './summary.js';

// Errors
export {
  ExportError,
  ItemProcessingError,
  SourceExhaustionError,
  CheckpointCorruptionError,
  CheckpointStoreError,
  errorMessage,
} from './errors.js';
export type { ExportErrorCode } from './errors.js';

// Config
export { exportConfig } from './config.js';
export type { ExportConfig, CheckpointBackend } from './config.js';

// Types
export type {
  CheckpointRecord,
  CheckpointStore,
  SourceItem,
  SourcePosition,
  SourcePage,
  ItemSource,
  ItemProcessor,
  ArtifactWriter,
  RunCounters,
  ProgressSnapshot,
  ProgressReporter,
  RunMode,
  RunOptions,
  ExportRequest,
  ExportDependencies,
  RunStatus,
  ItemFailure,
  RunSummary,
} from './types.js';
