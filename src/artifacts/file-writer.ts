/**
 * JSON File Artifact Writer
 *
 * Writes each artifact as pretty-printed JSON into one output directory.
 * The file is written to a temp name, fsynced and renamed into place, so a
 * reader (or a crash) never sees a partial artifact.
 */

import { mkdir, open, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { errorMessage } from '../export/errors.js';
import type { ArtifactWriter } from '../export/types.js';

export class JsonFileArtifactWriter<A> implements ArtifactWriter<A> {
  private dirReady = false;

  /**
   * @param nameFor - File name (no directory) for an artifact; must be stable per item
   */
  constructor(
    private readonly outputDir: string,
    private readonly nameFor: (artifact: A) => string,
  ) {}

  async write(artifact: A): Promise<string> {
    if (!this.dirReady) {
      await mkdir(this.outputDir, { recursive: true });
      this.dirReady = true;
    }

    const path = join(this.outputDir, this.nameFor(artifact));
    const tempPath = `${path}.${randomUUID()}.tmp`;

    try {
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(`${JSON.stringify(artifact, null, 2)}\n`, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, path);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.warn('[export] Could not remove temp artifact', { tempPath, error: errorMessage(cleanupErr) });
      });
      throw err;
    }

    return path;
  }
}
