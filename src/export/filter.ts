/**
 * Filter Specifications
 *
 * A filter selects which messages a job exports. The canonical serialization
 * of a filter (its signature) is half of the checkpoint key: two filters are
 * the same job exactly when their signatures are identical.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const FilterSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unread') }),
  z.object({ kind: z.literal('all'), limit: z.number().int().positive().optional() }),
  z.object({ kind: z.literal('recent'), days: z.number().int().positive() }),
  z.object({ kind: z.literal('folder'), name: z.string().trim().min(1) }),
  z.object({ kind: z.literal('search'), query: z.string().trim().min(1) }),
]);

export type FilterSpec = z.infer<typeof FilterSpecSchema>;

export type FilterKind = FilterSpec['kind'];

// ---------------------------------------------------------------------------
// Canonical Serialization
// ---------------------------------------------------------------------------

/**
 * Returns the canonical serialization of a filter: JSON with keys sorted
 * and undefined members omitted.
 *
 * The input is normalized through FilterSpecSchema first, so unknown keys
 * and surrounding whitespace in names and queries do not split a job.
 */
export function filterSignature(filter: FilterSpec): string {
  const normalized = FilterSpecSchema.parse(filter);
  const entries = Object.entries(normalized)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return JSON.stringify(Object.fromEntries(entries));
}

/** Short label for logs and summaries */
export function describeFilter(filter: FilterSpec): string {
  switch (filter.kind) {
    case 'unread':
      return 'unread';
    case 'all':
      return filter.limit === undefined ? 'all' : `all (limit ${filter.limit})`;
    case 'recent':
      return `recent ${filter.days}d`;
    case 'folder':
      return `folder ${filter.name}`;
    case 'search':
      return `search "${filter.query}"`;
  }
}
