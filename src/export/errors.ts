// ============================================================================
// Export Error Types: Typed errors for the export engine and its stores
// ============================================================================

export type ExportErrorCode =
  | 'ITEM_PROCESSING_FAILED'
  | 'SOURCE_EXHAUSTED'
  | 'CHECKPOINT_CORRUPT'
  | 'CHECKPOINT_STORE_FAILED';

/**
 * Base error for export failures.
 * Messages carry ids and counts only, never message content.
 */
export class ExportError extends Error {
  readonly code: ExportErrorCode;

  constructor(message: string, code: ExportErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExportError';
    this.code = code;
  }
}

/**
 * A single item could not be processed or written.
 * Recorded in the checkpoint's failedIds; never aborts a run.
 */
export class ItemProcessingError extends ExportError {
  readonly itemId: string;

  constructor(itemId: string, message: string, options?: { cause?: unknown }) {
    super(message, 'ITEM_PROCESSING_FAILED', options);
    this.name = 'ItemProcessingError';
    this.itemId = itemId;
  }
}

/**
 * The source could not deliver the next page, after its own retries.
 * Fatal to the run; the checkpoint stays resumable from the last completed page.
 */
export class SourceExhaustionError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SOURCE_EXHAUSTED', options);
    this.name = 'SourceExhaustionError';
  }
}

/**
 * A stored checkpoint failed structural validation on load.
 * Never treated as an empty record: an operator has to inspect or clear it.
 */
export class CheckpointCorruptionError extends ExportError {
  readonly checkpointLocation: string;

  constructor(checkpointLocation: string, detail: string, options?: { cause?: unknown }) {
    super(`Checkpoint at ${checkpointLocation} is corrupt: ${detail}`, 'CHECKPOINT_CORRUPT', options);
    this.name = 'CheckpointCorruptionError';
    this.checkpointLocation = checkpointLocation;
  }
}

/**
 * The checkpoint backend could not be read, written or cleared.
 * A failed save leaves the previously saved record intact.
 */
export class CheckpointStoreError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CHECKPOINT_STORE_FAILED', options);
    this.name = 'CheckpointStoreError';
  }
}

/** Human-readable message for any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
