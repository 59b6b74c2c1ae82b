/**
 * Application Entry Point
 *
 * Starts the Express export trigger and the BullMQ export worker in a
 * single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Start Express server on configured port
 * 3. Start the export worker
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close the worker (the running export stops at the next message and
 *    saves its checkpoint)
 * 3. Close the queue and checkpoint store connections
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './server/server.js';
import { createExportWorker, closeExportWorker } from './jobs/export-worker.js';
import { closeExportQueue } from './jobs/queue.js';
import { closeCheckpointStore } from './wiring.js';
import { appConfig } from './config.js';
import { exportConfig } from './export/config.js';

async function main() {
  console.log('[startup] Mailbox export service starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  console.log('[startup] Checkpoint backend:', exportConfig.checkpointBackend);

  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  createExportWorker();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[shutdown] Received ${signal}: shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeExportWorker();
    console.log('[shutdown] Export worker closed');

    await closeExportQueue();
    await closeCheckpointStore();
    console.log('[shutdown] Queue and checkpoint connections closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
