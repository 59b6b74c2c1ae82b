/**
 * Run summary rendering for the CLI and logs.
 *
 * Always lists every failure of the run with its reason, including when the
 * run ended on a fatal error.
 */

import type { RunStatus, RunSummary } from './types.js';

const STATUS_LABELS: Record<RunStatus, string> = {
  completed: 'Export completed',
  limit_reached: 'Export stopped: count limit reached',
  cancelled: 'Export cancelled (progress saved, resume to continue)',
  failed: 'Export failed (progress saved, resume to continue)',
};

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}

export function formatRunSummary(summary: RunSummary): string {
  const { counters } = summary;
  const lines = [STATUS_LABELS[summary.status]];

  if (summary.error) {
    lines.push(`Error [${summary.error.code}]: ${summary.error.message}`);
  }

  lines.push(`Account: ${summary.accountId}`);
  lines.push(`Filter: ${summary.filterSignature}`);
  lines.push(`Mode: ${summary.mode}`);

  const seen =
    summary.estimatedTotal !== undefined
      ? `${counters.totalSeen} of ~${summary.estimatedTotal}`
      : `${counters.totalSeen}`;
  lines.push(`Seen: ${seen}`);

  if (counters.totalInspected > 0) {
    lines.push(`Listed (not exported): ${counters.totalInspected}`);
  } else {
    lines.push(`Exported: ${counters.totalExported}`);
  }
  lines.push(`Skipped (already exported): ${counters.totalSkippedDuplicate}`);
  lines.push(`Failed: ${counters.totalFailed}`);
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);

  if (summary.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of summary.failures) {
      lines.push(`  - ${failure.id}: ${failure.reason}`);
    }
  }

  return lines.join('\n');
}
