/**
 * Filter -> Gmail search query.
 *
 * Relative terms only (newer_than:7d, never an absolute after: date), so the
 * query for a job and any page token issued for it stay valid across days.
 */

import type { FilterSpec } from '../export/filter.js';
import type { GmailQuery } from './types.js';

const FOLDER_QUERIES = new Map<string, string>([
  ['inbox', 'in:inbox'],
  ['sent', 'in:sent'],
  ['drafts', 'in:drafts'],
  ['spam', 'in:spam'],
  ['trash', 'in:trash'],
  ['starred', 'is:starred'],
  ['important', 'is:important'],
]);

const SPAM_TRASH_FOLDERS = new Set(['spam', 'trash']);

function folderQuery(name: string): GmailQuery {
  const trimmed = name.trim();
  const key = trimmed.toLowerCase();
  const known = FOLDER_QUERIES.get(key);
  if (known) {
    return { q: known, includeSpamTrash: SPAM_TRASH_FOLDERS.has(key) };
  }

  const label = /\s/.test(trimmed) ? `"${trimmed.replace(/"/g, '\\"')}"` : trimmed;
  return { q: `label:${label}`, includeSpamTrash: false };
}

export function buildGmailQuery(filter: FilterSpec): GmailQuery {
  switch (filter.kind) {
    case 'unread':
      return { q: 'is:unread', includeSpamTrash: false };
    case 'all':
      return { q: '', includeSpamTrash: false };
    case 'recent':
      return { q: `newer_than:${filter.days}d`, includeSpamTrash: false };
    case 'folder':
      return folderQuery(filter.name);
    case 'search':
      return { q: filter.query.trim(), includeSpamTrash: false };
  }
}
