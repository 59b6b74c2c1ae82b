#!/usr/bin/env node
/**
 * mailbox-export: command-line entry point
 *
 * Usage:
 *   mailbox-export --account user@example.com --all --max 500 --progress
 *   mailbox-export --account user@example.com --folder inbox --fresh --checkpoint-dir ./.checkpoints
 *   npx tsx src/cli/export.ts --account user@example.com --recent 7 --inspect
 */

import { errorMessage } from '../export/errors.js';
import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error('[export] Fatal error:', errorMessage(err));
    process.exit(1);
  });
