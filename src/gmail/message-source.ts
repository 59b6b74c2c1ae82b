/**
 * Gmail Message Source
 *
 * Pages through users.messages.list for a filter, newest first (Gmail's
 * order). The cursor handed to the engine is opaque JSON:
 *
 *   { "pageToken": "<token of the page to fetch>" | null, "ordinal": <items before it> }
 *
 * `ordinal` lets the `all` filter's limit survive a resume: pages are
 * trimmed and the stream ends once `limit` messages have been yielded.
 *
 * Page tokens can expire. A rejected token (HTTP 400) or an unreadable cursor
 * restarts the listing from the first page; the engine's id-based dedup
 * skips what was already exported.
 */

import type { gmail_v1 } from 'googleapis';
import { z } from 'zod';
import { SourceExhaustionError, errorMessage } from '../export/errors.js';
import type { FilterSpec } from '../export/filter.js';
import type { ItemSource, SourceItem, SourcePage, SourcePosition } from '../export/types.js';
import { clampPageSize, gmailConfig } from './config.js';
import type { RetryPolicy } from './config.js';
import { toGmailError } from './gmail-client.js';
import { buildGmailQuery } from './query.js';
import { httpStatusOf, withRetry } from './retry.js';
import type { GmailMessagesApi, GmailQuery } from './types.js';

// ---------------------------------------------------------------------------
// Cursor
// ---------------------------------------------------------------------------

const GmailCursorSchema = z.object({
  pageToken: z.string().min(1).nullable(),
  ordinal: z.number().int().nonnegative(),
});

export type GmailCursor = z.infer<typeof GmailCursorSchema>;

export function encodeCursor(cursor: GmailCursor): string {
  return JSON.stringify(cursor);
}

/** Returns null for anything that is not a cursor this source issued */
export function decodeCursor(raw: string): GmailCursor | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = GmailCursorSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

const START: GmailCursor = { pageToken: null, ordinal: 0 };

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export interface GmailMessageSourceOptions {
  pageSize?: number;
  retry?: RetryPolicy;
}

type ListResponse = gmail_v1.Schema$ListMessagesResponse;

export class GmailMessageSource implements ItemSource {
  private readonly pageSize: number;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly gmail: GmailMessagesApi,
    options: GmailMessageSourceOptions = {},
  ) {
    this.pageSize = clampPageSize(options.pageSize ?? gmailConfig.pageSize);
    this.retry = options.retry ?? gmailConfig.retry;
  }

  async nextPage(position: SourcePosition, filter: FilterSpec): Promise<SourcePage> {
    const query = buildGmailQuery(filter);
    const limit = filter.kind === 'all' ? filter.limit : undefined;

    if (position.type === 'offset') {
      return this.pageFromOffset(Math.max(0, position.offset), query, limit);
    }

    let cursor = START;
    if (position.cursor !== null) {
      const decoded = decodeCursor(position.cursor);
      if (decoded) {
        cursor = decoded;
      } else {
        console.warn('[gmail] Unreadable cursor, restarting from the first page');
      }
    }
    return this.pageAt(cursor, query, limit);
  }

  private async pageAt(cursor: GmailCursor, query: GmailQuery, limit: number | undefined): Promise<SourcePage> {
    if (limit !== undefined && cursor.ordinal >= limit) {
      return { items: [], nextCursor: null, estimatedTotal: limit };
    }

    const maxResults = limit === undefined ? this.pageSize : Math.min(this.pageSize, limit - cursor.ordinal);

    let response: ListResponse;
    try {
      response = await this.list(query, cursor.pageToken, maxResults);
    } catch (err) {
      if (cursor.pageToken !== null && httpStatusOf(err) === 400) {
        console.warn('[gmail] Page token rejected, restarting from the first page', {
          ordinal: cursor.ordinal,
          error: errorMessage(err),
        });
        return this.pageAt(START, query, limit);
      }
      throw listingError(err);
    }

    return buildPage(response, cursor.ordinal, 0, limit);
  }

  /** Walks pages until the one containing message number offset + 1 */
  private async pageFromOffset(offset: number, query: GmailQuery, limit: number | undefined): Promise<SourcePage> {
    if (limit !== undefined && offset >= limit) {
      return { items: [], nextCursor: null, estimatedTotal: limit };
    }

    let pageToken: string | null = null;
    let ordinal = 0;

    for (;;) {
      let response: ListResponse;
      try {
        response = await this.list(query, pageToken, this.pageSize);
      } catch (err) {
        throw listingError(err);
      }

      const count = listedIds(response).length;
      if (ordinal + count > offset || !response.nextPageToken) {
        return buildPage(response, ordinal, offset - ordinal, limit);
      }

      ordinal += count;
      pageToken = response.nextPageToken;
    }
  }

  private async list(query: GmailQuery, pageToken: string | null, maxResults: number): Promise<ListResponse> {
    const { data } = await withRetry(
      () =>
        this.gmail.users.messages.list({
          userId: 'me',
          q: query.q || undefined,
          includeSpamTrash: query.includeSpamTrash,
          maxResults,
          pageToken: pageToken ?? undefined,
        }),
      this.retry,
      'messages.list',
    );
    return data;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function listingError(err: unknown): SourceExhaustionError {
  const cause = toGmailError(err);
  return new SourceExhaustionError(`Gmail message listing failed: ${errorMessage(cause)}`, { cause });
}

function listedIds(response: ListResponse): SourceItem[] {
  const items: SourceItem[] = [];
  for (const message of response.messages ?? []) {
    if (!message.id) continue;
    items.push({ id: message.id, metadata: message.threadId ? { threadId: message.threadId } : {} });
  }
  return items;
}

/**
 * @param ordinal - Number of messages before this listing page
 * @param skip - Leading messages of the page to drop (offset positioning)
 */
function buildPage(response: ListResponse, ordinal: number, skip: number, limit: number | undefined): SourcePage {
  const listed = listedIds(response);
  const pageEnd = ordinal + listed.length;
  let items = listed.slice(skip);

  if (limit !== undefined) {
    items = items.slice(0, Math.max(0, limit - (ordinal + skip)));
  }

  const limitHit = limit !== undefined && pageEnd >= limit;
  const nextCursor =
    response.nextPageToken && !limitHit
      ? encodeCursor({ pageToken: response.nextPageToken, ordinal: pageEnd })
      : null;

  const estimate = response.resultSizeEstimate ?? undefined;
  const estimatedTotal =
    limit !== undefined && estimate !== undefined ? Math.min(estimate, limit) : estimate;

  return { items, nextCursor, estimatedTotal };
}
