/**
 * Tests for progress lines, the console reporter and run summaries
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleProgressReporter, formatProgressLine } from '../progress.js';
import { formatRunSummary } from '../summary.js';
import type { ProgressSnapshot, RunSummary } from '../types.js';

function snapshot(overrides: Partial<ProgressSnapshot> = {}): ProgressSnapshot {
  return {
    event: 'item',
    totalSeen: 0,
    totalExported: 0,
    totalSkippedDuplicate: 0,
    totalFailed: 0,
    totalInspected: 0,
    ...overrides,
  };
}

describe('formatProgressLine', () => {
  it('shows seen against the estimate and the outcome counts', () => {
    const line = formatProgressLine(
      snapshot({ totalSeen: 3, totalExported: 2, totalSkippedDuplicate: 1, estimatedTotal: 10 }),
    );
    expect(line).toBe('Progress: 3/10 seen (2 exported, 1 skipped, 0 failed)');
  });

  it('omits the estimate when the source gave none', () => {
    expect(formatProgressLine(snapshot({ totalSeen: 1, totalFailed: 1 }))).toBe(
      'Progress: 1 seen (0 exported, 0 skipped, 1 failed)',
    );
  });

  it('describes inspection runs as listing', () => {
    expect(formatProgressLine(snapshot({ totalSeen: 5, totalInspected: 4, totalSkippedDuplicate: 1 }))).toBe(
      'Progress: 5 seen (4 listed, 1 already exported)',
    );
  });
});

describe('ConsoleProgressReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs every N items and after every page', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new ConsoleProgressReporter(2);

    reporter.report(snapshot({ totalSeen: 1, totalExported: 1 }));
    reporter.report(snapshot({ totalSeen: 2, totalExported: 2 }));
    reporter.report(snapshot({ totalSeen: 3, totalExported: 3 }));
    reporter.report(snapshot({ event: 'page', totalSeen: 3, totalExported: 3 }));
    reporter.report(snapshot({ totalSeen: 4, totalExported: 4 }));
    reporter.report(snapshot({ totalSeen: 5, totalExported: 5 }));

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '[export] Progress: 2 seen (2 exported, 0 skipped, 0 failed)',
      '[export] Progress: 3 seen (3 exported, 0 skipped, 0 failed)',
      '[export] Progress: 5 seen (5 exported, 0 skipped, 0 failed)',
    ]);
  });
});

describe('formatRunSummary', () => {
  const base: RunSummary = {
    accountId: 'user@example.com',
    filterSignature: '{"kind":"unread"}',
    mode: 'resume',
    status: 'completed',
    counters: {
      totalSeen: 4,
      totalExported: 2,
      totalSkippedDuplicate: 1,
      totalFailed: 1,
      totalInspected: 0,
    },
    estimatedTotal: 10,
    failures: [{ id: 'm3', reason: 'cannot process m3' }],
    cursor: null,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.500Z',
    durationMs: 1500,
  };

  it('lists counts and every failure, including on fatal termination', () => {
    const text = formatRunSummary({
      ...base,
      status: 'failed',
      error: { code: 'SOURCE_EXHAUSTED', message: 'Gmail message listing failed: quota' },
    });

    expect(text.split('\n')).toEqual([
      'Export failed (progress saved, resume to continue)',
      'Error [SOURCE_EXHAUSTED]: Gmail message listing failed: quota',
      'Account: user@example.com',
      'Filter: {"kind":"unread"}',
      'Mode: resume',
      'Seen: 4 of ~10',
      'Exported: 2',
      'Skipped (already exported): 1',
      'Failed: 1',
      'Duration: 1.5s',
      '',
      'Failures:',
      '  - m3: cannot process m3',
    ]);
  });

  it('reports inspection runs as listed', () => {
    const text = formatRunSummary({
      ...base,
      status: 'limit_reached',
      estimatedTotal: undefined,
      failures: [],
      counters: { ...base.counters, totalExported: 0, totalFailed: 0, totalInspected: 3 },
      durationMs: 250,
    });

    expect(text.split('\n')).toEqual([
      'Export stopped: count limit reached',
      'Account: user@example.com',
      'Filter: {"kind":"unread"}',
      'Mode: resume',
      'Seen: 4',
      'Listed (not exported): 3',
      'Skipped (already exported): 1',
      'Failed: 0',
      'Duration: 250ms',
    ]);
  });

  it('formats long durations in minutes', () => {
    expect(formatRunSummary({ ...base, durationMs: 125000 })).toContain('Duration: 2m 5s');
  });
});
