/**
 * CLI Runner
 *
 * Parses arguments, wires the Gmail dependencies and runs one export.
 * With --profile it only prints the mailbox address and totals.
 *
 * Ctrl+C asks the engine to stop after the current message (progress is
 * saved); a second Ctrl+C exits immediately.
 *
 * Exit codes: 0 done (completed or limit reached), 1 failed,
 * 2 usage error, 130 cancelled.
 */

import {
  ConsoleProgressReporter,
  FileCheckpointStore,
  RedisCheckpointStore,
  exportConfig,
  formatRunSummary,
  runExport,
} from '../export/index.js';
import type { CheckpointStore, RunStatus } from '../export/index.js';
import { GmailAuthError, getAccountProfile, getGmailReadonlyClient } from '../gmail/index.js';
import { buildGmailExportDependencies, createCheckpointStore } from '../wiring.js';
import { CliUsageError, parseExportArgs } from './args.js';
import type { ExportCliOptions } from './args.js';

const EXIT_CODES: Record<RunStatus, number> = {
  completed: 0,
  limit_reached: 0,
  failed: 1,
  cancelled: 130,
};

function logAuthFailure(err: GmailAuthError): void {
  console.error('[export] Gmail authentication failed', { code: err.code, error: err.message });
}

async function printProfile(accountId: string): Promise<number> {
  try {
    const profile = await getAccountProfile(getGmailReadonlyClient(accountId));
    console.log(
      [
        `Account: ${profile.emailAddress}`,
        `Messages: ${profile.messagesTotal ?? 'unknown'}`,
        `Threads: ${profile.threadsTotal ?? 'unknown'}`,
      ].join('\n'),
    );
    return 0;
  } catch (err) {
    if (err instanceof GmailAuthError) {
      logAuthFailure(err);
      return 1;
    }
    throw err;
  }
}

export async function runCli(argv: string[]): Promise<number> {
  let options: ExportCliOptions;
  try {
    options = parseExportArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      if (err.exitCode !== 0) {
        console.error(err.message);
        console.error('Run with --help for usage.');
      }
      return err.exitCode;
    }
    throw err;
  }

  if (options.profile) {
    return printProfile(options.accountId);
  }

  const store: CheckpointStore = options.checkpointDir
    ? new FileCheckpointStore(options.checkpointDir)
    : createCheckpointStore();

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      console.warn('[export] Second interrupt, exiting now');
      process.exit(130);
    }
    console.warn('[export] Interrupt received, stopping after the current message (Ctrl+C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  try {
    const deps = buildGmailExportDependencies({
      accountId: options.accountId,
      outputDir: options.outputDir,
      store,
      reporter: options.progress ? new ConsoleProgressReporter(exportConfig.progressLogEvery) : undefined,
    });

    const summary = await runExport(
      {
        accountId: options.accountId,
        filter: options.filter,
        mode: options.mode,
        options: { countLimit: options.countLimit, createArtifact: options.createArtifact },
        signal: controller.signal,
      },
      deps,
    );

    console.log(formatRunSummary(summary));
    return EXIT_CODES[summary.status];
  } catch (err) {
    if (err instanceof GmailAuthError) {
      logAuthFailure(err);
      return 1;
    }
    throw err;
  } finally {
    process.off('SIGINT', onInterrupt);
    if (store instanceof RedisCheckpointStore) {
      await store.close();
    }
  }
}

