/**
 * Tests for CLI argument parsing
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CliUsageError, parseExportArgs } from '../args.js';
import { exportConfig } from '../../export/config.js';

const ACCOUNT = ['--account', 'user@example.com'];

function usageError(argv: string[]): CliUsageError {
  try {
    parseExportArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) return err;
    throw err;
  }
  throw new Error(`expected a usage error for: ${argv.join(' ')}`);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseExportArgs', () => {
  it('defaults to unread, resume, no limit, artifacts on', () => {
    expect(parseExportArgs(ACCOUNT)).toEqual({
      accountId: 'user@example.com',
      filter: { kind: 'unread' },
      mode: { type: 'resume' },
      countLimit: undefined,
      createArtifact: true,
      outputDir: exportConfig.outputDir,
      checkpointDir: undefined,
      progress: false,
      profile: false,
    });
  });

  it('parses each filter', () => {
    expect(parseExportArgs([...ACCOUNT, '--all']).filter).toEqual({ kind: 'all', limit: undefined });
    expect(parseExportArgs([...ACCOUNT, '--all', '--max', '500']).filter).toEqual({ kind: 'all', limit: 500 });
    expect(parseExportArgs([...ACCOUNT, '--recent', '7']).filter).toEqual({ kind: 'recent', days: 7 });
    expect(parseExportArgs([...ACCOUNT, '--folder', ' Receipts ']).filter).toEqual({ kind: 'folder', name: 'Receipts' });
    expect(parseExportArgs([...ACCOUNT, '--search', 'from:ana@example.com']).filter).toEqual({
      kind: 'search',
      query: 'from:ana@example.com',
    });
  });

  it('parses modes', () => {
    expect(parseExportArgs([...ACCOUNT, '--fresh']).mode).toEqual({ type: 'fresh' });
    expect(parseExportArgs([...ACCOUNT, '--resume']).mode).toEqual({ type: 'resume' });
    expect(parseExportArgs([...ACCOUNT, '--start-from', '40']).mode).toEqual({ type: 'start-from', position: 40 });
  });

  it('parses --profile', () => {
    expect(parseExportArgs([...ACCOUNT, '--profile']).profile).toBe(true);
  });

  it('parses count, inspection, directories and progress', () => {
    const options = parseExportArgs([
      ...ACCOUNT,
      '--count',
      '25',
      '--inspect',
      '--output',
      '/data/context',
      '--checkpoint-dir',
      '/data/checkpoints',
      '--progress',
    ]);

    expect(options).toMatchObject({
      countLimit: 25,
      createArtifact: false,
      outputDir: '/data/context',
      checkpointDir: '/data/checkpoints',
      progress: true,
    });
  });

  it('treats --count 0 as unlimited', () => {
    expect(parseExportArgs([...ACCOUNT, '--count', '0']).countLimit).toBeUndefined();
  });

  it('rejects combined filters', () => {
    expect(usageError([...ACCOUNT, '--unread', '--recent', '3']).message).toBe(
      'Choose one filter, got --unread and --recent',
    );
  });

  it('rejects --max without --all', () => {
    expect(usageError([...ACCOUNT, '--max', '5']).message).toBe('--max only applies to --all');
  });

  it('rejects blank folder and search values', () => {
    expect(usageError([...ACCOUNT, '--folder', '  ']).message).toBe('--folder needs a folder or label name');
    expect(usageError([...ACCOUNT, '--search', ' ']).message).toBe('--search needs a query');
  });

  it('rejects conflicting modes', () => {
    expect(usageError([...ACCOUNT, '--fresh', '--resume']).message).toBe('--fresh and --resume cannot be combined');
    expect(usageError([...ACCOUNT, '--fresh', '--start-from', '3']).message).toBe(
      '--start-from cannot be combined with --fresh',
    );
  });

  it('rejects a missing or blank account', () => {
    expect(usageError([]).exitCode).toBe(2);
    expect(usageError(['--account', ' ']).message).toBe('--account must not be empty');
  });

  it('rejects non-numeric and out-of-range numbers', () => {
    const error = usageError([...ACCOUNT, '--recent', 'seven']);
    expect(error.exitCode).toBe(2);
    expect(error.message).toContain('Must be a positive integer.');
    expect(usageError([...ACCOUNT, '--count', '-1']).message).toContain('Must be a non-negative integer.');
    expect(usageError([...ACCOUNT, '--start-from', '0']).message).toContain('Must be a positive integer.');
  });

  it('exits 0 after showing help', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(usageError(['--help']).exitCode).toBe(0);
  });
});
