/**
 * Movie Search
 *
 * Keyword filtering and sorting over enriched records.
 */

import type { EnrichedRecord } from '@/types';

export type SortField = 'duration' | 'title';

export interface SortSpec {
  field: SortField;
  descending: boolean;
}

type Comparator = (a: EnrichedRecord, b: EnrichedRecord) => number;

export const DEFAULT_SORT = 'duration';

const COMPARATORS: Record<SortField, Comparator> = {
  duration: (a, b) => a.durationMinutes - b.durationMinutes,
  title: (a, b) => compareTitles(a.title, b.title),
};

function isSortField(value: string): value is SortField {
  return value === 'duration' || value === 'title';
}

/**
 * Missing titles sort first; others compare case-insensitively
 */
function compareTitles(a: string | null, b: string | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Parse a sort expression such as `duration` or `-duration`
 * @returns null for unknown fields
 */
export function parseSort(sort: string): SortSpec | null {
  const descending = sort.startsWith('-');
  const field = descending ? sort.slice(1) : sort;
  return isSortField(field) ? { field, descending } : null;
}

/**
 * Lower-case and trim keywords, dropping blanks
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  return keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0);
}

/**
 * True if any keyword occurs in the record's title, plot or genres
 */
export function matchesKeywords(record: EnrichedRecord, keywords: readonly string[]): boolean {
  const haystack = [record.title ?? '', record.plot ?? '', record.genres.join(' ')].join(' ').toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword));
}

/**
 * Filter records by keywords, then sort them.
 *
 * Without usable keywords every record is kept. Unknown sort fields keep the
 * input order. Sorting is stable in both directions.
 */
export function searchMovies(
  records: readonly EnrichedRecord[],
  keywords: readonly string[] = [],
  sort: string = DEFAULT_SORT
): EnrichedRecord[] {
  const normalized = normalizeKeywords(keywords);
  const filtered =
    normalized.length > 0 ? records.filter((record) => matchesKeywords(record, normalized)) : [...records];

  const parsed = parseSort(sort);
  if (!parsed) {
    return filtered;
  }

  const compare = COMPARATORS[parsed.field];
  return filtered.sort(parsed.descending ? (a, b) => compare(b, a) : compare);
}
