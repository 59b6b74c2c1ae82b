/**
 * Export Engine Type Definitions
 *
 * - CheckpointRecord / CheckpointStore: durable per-job progress
 * - ItemSource / ItemProcessor / ArtifactWriter / ProgressReporter: the
 *   collaborators the engine drives (Gmail implementations in src/gmail,
 *   file output in src/artifacts)
 * - ExportRequest / RunSummary: the engine's entry point and result
 *
 * Consumers: engine.ts, the checkpoint stores, src/jobs (BullMQ worker),
 * src/cli (command line runner)
 */

import type { FilterSpec } from './filter.js';
import type { ExportErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// Checkpoint
// ---------------------------------------------------------------------------

/** Durable progress of one job: one record per (accountId, filterSignature) */
export interface CheckpointRecord {
  accountId: string;
  filterSignature: string;
  /** Ids already exported; a Set so no id can appear twice */
  processedIds: Set<string>;
  /** Id -> last failure reason. Diagnostic only */
  failedIds: Map<string, string>;
  /** Opaque source position of the next page to fetch; null = natural start */
  cursor: string | null;
  /** ISO timestamp, never moves backwards */
  lastUpdated: string;
}

export interface CheckpointStore {
  /** Returns an empty record when the job has no checkpoint yet */
  load(accountId: string, filterSignature: string): Promise<CheckpointRecord>;
  /** Atomic with respect to a crash: readers see the old or the new record */
  save(record: CheckpointRecord): Promise<void>;
  clear(accountId: string, filterSignature: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface SourceItem {
  id: string;
  metadata: Record<string, string>;
}

/** Where the source should start reading */
export type SourcePosition =
  | { type: 'cursor'; cursor: string | null }
  | { type: 'offset'; offset: number };

export interface SourcePage {
  items: SourceItem[];
  /** Position of the following page; null at end of stream */
  nextCursor: string | null;
  estimatedTotal?: number;
}

export interface ItemSource {
  nextPage(position: SourcePosition, filter: FilterSpec): Promise<SourcePage>;
}

/** Converts one item into an artifact. Rejects on failure; must be safe to retry */
export interface ItemProcessor<A> {
  process(item: SourceItem): Promise<A>;
}

/** Durably writes one artifact and returns where it went */
export interface ArtifactWriter<A> {
  write(artifact: A): Promise<string>;
}

export interface RunCounters {
  totalSeen: number;
  totalExported: number;
  totalSkippedDuplicate: number;
  totalFailed: number;
  /** Items enumerated by an inspection run (createArtifact: false) */
  totalInspected: number;
}

export interface ProgressSnapshot extends RunCounters {
  event: 'item' | 'page';
  estimatedTotal?: number;
}

/** Observational only; the engine never waits on it */
export interface ProgressReporter {
  report(snapshot: ProgressSnapshot): void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Requests & Results
// ---------------------------------------------------------------------------

export type RunMode =
  | { type: 'fresh' }
  | { type: 'resume' }
  /** 1-based message number to begin at */
  | { type: 'start-from'; position: number };

export interface RunOptions {
  /** Stop after this many exported (or, when inspecting, enumerated) items */
  countLimit?: number;
  /** false = inspection only: no processing, no artifacts, no checkpoint writes */
  createArtifact?: boolean;
}

export interface ExportRequest {
  accountId: string;
  filter: FilterSpec;
  mode: RunMode;
  options?: RunOptions;
  /** Cooperative cancellation, honored between items and pages */
  signal?: AbortSignal;
}

export interface ExportDependencies<A> {
  source: ItemSource;
  processor: ItemProcessor<A>;
  writer: ArtifactWriter<A>;
  store: CheckpointStore;
  reporter?: ProgressReporter;
  /** Injectable clock for tests */
  now?: () => Date;
}

export type RunStatus = 'completed' | 'limit_reached' | 'cancelled' | 'failed';

export interface ItemFailure {
  id: string;
  reason: string;
}

export interface RunSummary {
  accountId: string;
  filterSignature: string;
  mode: RunMode['type'];
  status: RunStatus;
  counters: RunCounters;
  estimatedTotal?: number;
  /** Failures recorded during this run */
  failures: ItemFailure[];
  /** Cursor as last persisted (or as reached, for inspection runs) */
  cursor: string | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  error?: {
    code: ExportErrorCode;
    message: string;
  };
}
