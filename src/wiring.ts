/**
 * Export Wiring
 *
 * Assembles the engine's dependencies for a Gmail account: message source,
 * artifact processor, JSON file writer and checkpoint store. Shared by the
 * BullMQ worker and the CLI.
 */

import { JsonFileArtifactWriter, artifactFileName } from './artifacts/index.js';
import { FileCheckpointStore, RedisCheckpointStore, exportConfig } from './export/index.js';
import type { CheckpointBackend, CheckpointStore, ExportDependencies, ProgressReporter } from './export/index.js';
import { GmailArtifactProcessor, GmailMessageSource, getGmailReadonlyClient } from './gmail/index.js';
import type { GmailMessagesApi, MessageArtifact } from './gmail/index.js';

// ---------------------------------------------------------------------------
// Checkpoint Store
// ---------------------------------------------------------------------------

export function createCheckpointStore(
  backend: CheckpointBackend = exportConfig.checkpointBackend,
  dir: string = exportConfig.checkpointDir,
): FileCheckpointStore | RedisCheckpointStore {
  return backend === 'file' ? new FileCheckpointStore(dir) : new RedisCheckpointStore();
}

// Lazy singleton for the service process (worker + HTTP status route)
let _store: FileCheckpointStore | RedisCheckpointStore | null = null;

export function getCheckpointStore(): CheckpointStore {
  if (!_store) {
    _store = createCheckpointStore();
  }
  return _store;
}

/** Quits the Redis connection, if the shared store opened one */
export async function closeCheckpointStore(): Promise<void> {
  if (_store instanceof RedisCheckpointStore) {
    await _store.close();
  }
  _store = null;
}

// ---------------------------------------------------------------------------
// Gmail Dependencies
// ---------------------------------------------------------------------------

export interface GmailExportOptions {
  accountId: string;
  store: CheckpointStore;
  outputDir?: string;
  reporter?: ProgressReporter;
  /** Defaults to the cached read-only client for accountId */
  gmail?: GmailMessagesApi;
}

export function buildGmailExportDependencies(options: GmailExportOptions): ExportDependencies<MessageArtifact> {
  const gmail = options.gmail ?? getGmailReadonlyClient(options.accountId);

  return {
    source: new GmailMessageSource(gmail),
    processor: new GmailArtifactProcessor(gmail, options.accountId),
    writer: new JsonFileArtifactWriter<MessageArtifact>(options.outputDir ?? exportConfig.outputDir, artifactFileName),
    store: options.store,
    reporter: options.reporter,
  };
}
