/**
 * Artifact file naming.
 *
 * context-{YYYYMMDDHHMMSS, UTC}-{messageId}.json
 *
 * The message id makes the name unique and stable, so re-exporting a message
 * overwrites its own file instead of colliding with another message received
 * in the same second.
 */

import type { MessageArtifact } from '../gmail/types.js';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** UTC timestamp as YYYYMMDDHHMMSS; null for unparseable input */
export function compactTimestamp(iso: string | null): string | null {
  if (!iso) return null;
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return null;

  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/** Keeps [A-Za-z0-9_-]; everything else becomes '_' */
export function safeFileComponent(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_-]/g, '_');
  return cleaned || 'unnamed';
}

export function artifactFileName(artifact: Pick<MessageArtifact, 'messageId' | 'receivedAt'>): string {
  const timestamp = compactTimestamp(artifact.receivedAt) ?? 'unknown';
  return `context-${timestamp}-${safeFileComponent(artifact.messageId)}.json`;
}
