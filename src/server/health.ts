/**
 * Health Check Endpoint Handler
 *
 * Returns server status, kill switch state, checkpoint backend, version
 * and timestamp.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';
import { exportConfig } from '../export/config.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    killSwitch: appConfig.killSwitch,
    checkpointBackend: exportConfig.checkpointBackend,
    version: process.env.npm_package_version ?? 'dev',
  });
}
