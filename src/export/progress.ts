/**
 * Progress Reporting
 *
 * notifyProgress() is how the engine talks to a ProgressReporter: the call
 * is never awaited, and a reporter that throws or rejects is logged and
 * otherwise ignored.
 *
 * ConsoleProgressReporter logs a progress line every N items and after
 * every page, in the same `[prefix] message` form as the rest of the logs.
 */

import { errorMessage } from './errors.js';
import type { ProgressReporter, ProgressSnapshot } from './types.js';

function logReporterError(err: unknown): void {
  console.warn('[export] Progress reporter failed', { error: errorMessage(err) });
}

export function notifyProgress(reporter: ProgressReporter | undefined, snapshot: ProgressSnapshot): void {
  if (!reporter) return;

  try {
    const result = reporter.report(snapshot);
    if (result instanceof Promise) {
      result.catch(logReporterError);
    }
  } catch (err) {
    logReporterError(err);
  }
}

/** Formats "seen/estimate" or just "seen" when the source gave no estimate */
export function formatProgressLine(snapshot: ProgressSnapshot): string {
  const position =
    snapshot.estimatedTotal !== undefined
      ? `${snapshot.totalSeen}/${snapshot.estimatedTotal}`
      : `${snapshot.totalSeen}`;

  const parts =
    snapshot.totalInspected > 0
      ? [`${snapshot.totalInspected} listed`, `${snapshot.totalSkippedDuplicate} already exported`]
      : [
          `${snapshot.totalExported} exported`,
          `${snapshot.totalSkippedDuplicate} skipped`,
          `${snapshot.totalFailed} failed`,
        ];

  return `Progress: ${position} seen (${parts.join(', ')})`;
}

export class ConsoleProgressReporter implements ProgressReporter {
  private lastLoggedSeen = 0;

  /**
   * @param everyItems - Log an item-level line each time this many more items were seen
   */
  constructor(private readonly everyItems: number = 10) {}

  report(snapshot: ProgressSnapshot): void {
    if (snapshot.event === 'item' && snapshot.totalSeen - this.lastLoggedSeen < this.everyItems) {
      return;
    }
    this.lastLoggedSeen = snapshot.totalSeen;
    console.log(`[export] ${formatProgressLine(snapshot)}`);
  }
}
