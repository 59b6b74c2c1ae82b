/**
 * Command-line arguments for `mailbox-export`.
 *
 * Commander parses the flags; parseExportArgs() then checks the combinations
 * commander cannot express (one filter, one mode) and builds the typed
 * options the runner needs.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { exportConfig } from '../export/config.js';
import type { FilterSpec } from '../export/filter.js';
import type { RunMode } from '../export/types.js';

export interface ExportCliOptions {
  accountId: string;
  filter: FilterSpec;
  mode: RunMode;
  /** undefined = no limit */
  countLimit?: number;
  createArtifact: boolean;
  outputDir: string;
  /** Set = file checkpoints in this directory instead of the configured backend */
  checkpointDir?: string;
  progress: boolean;
  /** Print the mailbox profile instead of exporting */
  profile: boolean;
}

/** Bad arguments, or help was shown. exitCode is what the process should exit with */
export class CliUsageError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 2) {
    super(message);
    this.name = 'CliUsageError';
    this.exitCode = exitCode;
  }
}

type RawOptions = {
  account: string;
  unread?: boolean;
  all?: boolean;
  max?: number;
  recent?: number;
  folder?: string;
  search?: string;
  count: number;
  fresh?: boolean;
  resume?: boolean;
  startFrom?: number;
  inspect?: boolean;
  output: string;
  checkpointDir?: string;
  progress?: boolean;
  profile?: boolean;
};

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function buildExportCommand(): Command {
  return new Command()
    .name('mailbox-export')
    .description('Export Gmail messages into JSON context files, resuming where the last run stopped')
    .requiredOption('--account <email>', 'Gmail account to export')
    .option('--unread', 'Export unread messages (default filter)')
    .option('--all', 'Export all messages')
    .option('--max <n>', 'With --all: only the newest N messages', positiveInt)
    .option('--recent <days>', 'Export messages from the last N days', positiveInt)
    .option('--folder <name>', 'Export a folder or label (inbox, sent, starred, or a label name)')
    .option('--search <query>', 'Export messages matching a Gmail search query')
    .option('--count <n>', 'Export at most N messages in this run (0 = unlimited)', nonNegativeInt, 0)
    .option('--fresh', 'Discard saved progress for this account and filter, start over')
    .option('--resume', 'Continue from saved progress (default)')
    .option('--start-from <n>', 'Begin at message N (1-based), keeping saved progress', positiveInt)
    .option('--inspect', 'List matching messages without writing artifacts or progress')
    .option('--output <dir>', 'Directory for artifact files', exportConfig.outputDir)
    .option('--checkpoint-dir <dir>', 'Keep checkpoints as files in DIR instead of Redis')
    .option('--progress', 'Log progress while exporting')
    .option('--profile', 'Print the mailbox address and message totals, then exit')
    .exitOverride()
    .configureOutput({ outputError: () => undefined });
}

function buildFilter(raw: RawOptions): FilterSpec {
  const chosen = [
    raw.unread && '--unread',
    raw.all && '--all',
    raw.recent !== undefined && '--recent',
    raw.folder !== undefined && '--folder',
    raw.search !== undefined && '--search',
  ].filter((flag): flag is string => typeof flag === 'string');

  if (chosen.length > 1) {
    throw new CliUsageError(`Choose one filter, got ${chosen.join(' and ')}`);
  }
  if (raw.max !== undefined && !raw.all) {
    throw new CliUsageError('--max only applies to --all');
  }

  if (raw.all) return { kind: 'all', limit: raw.max };
  if (raw.recent !== undefined) return { kind: 'recent', days: raw.recent };
  if (raw.folder !== undefined) {
    const name = raw.folder.trim();
    if (!name) throw new CliUsageError('--folder needs a folder or label name');
    return { kind: 'folder', name };
  }
  if (raw.search !== undefined) {
    const query = raw.search.trim();
    if (!query) throw new CliUsageError('--search needs a query');
    return { kind: 'search', query };
  }
  return { kind: 'unread' };
}

function buildMode(raw: RawOptions): RunMode {
  if (raw.fresh && raw.resume) {
    throw new CliUsageError('--fresh and --resume cannot be combined');
  }
  if (raw.startFrom !== undefined) {
    if (raw.fresh) {
      throw new CliUsageError('--start-from cannot be combined with --fresh');
    }
    return { type: 'start-from', position: raw.startFrom };
  }
  return raw.fresh ? { type: 'fresh' } : { type: 'resume' };
}

/**
 * @param argv - Arguments after the executable and script path
 * @throws CliUsageError on invalid arguments (exitCode 2) or after printing help (exitCode 0)
 */
export function parseExportArgs(argv: string[]): ExportCliOptions {
  const command = buildExportCommand();

  try {
    command.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      throw new CliUsageError(err.message, err.exitCode === 0 ? 0 : 2);
    }
    throw err;
  }

  const raw = command.opts<RawOptions>();
  const accountId = raw.account.trim();
  if (!accountId) {
    throw new CliUsageError('--account must not be empty');
  }

  return {
    accountId,
    filter: buildFilter(raw),
    mode: buildMode(raw),
    countLimit: raw.count > 0 ? raw.count : undefined,
    createArtifact: !raw.inspect,
    outputDir: raw.output,
    checkpointDir: raw.checkpointDir,
    progress: raw.progress ?? false,
    profile: raw.profile ?? false,
  };
}
