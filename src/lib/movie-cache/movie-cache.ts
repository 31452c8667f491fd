/**
 * Movie Metadata Cache
 *
 * Key/value store of enriched records keyed by absolute file path.
 * Copies data in on construction and out on enumeration, so callers never
 * share the internal map.
 */

import type { EnrichedRecord } from '@/types';

/**
 * Storage capability used by the enrichment pipeline and the API
 */
export interface MetadataCache {
  get(key: string): EnrichedRecord | undefined;
  set(key: string, record: EnrichedRecord): void;
  exists(key: string): boolean;
  clear(): void;
  /** Snapshot of all entries in insertion order */
  getAll(): Map<string, EnrichedRecord>;
  readonly size: number;
}

export type CacheSeed =
  | ReadonlyMap<string, EnrichedRecord>
  | Iterable<readonly [string, EnrichedRecord]>
  | Readonly<Record<string, EnrichedRecord>>;

/**
 * Build an immutable record. Genres are copied so later changes to the
 * caller's array do not leak into the cache.
 */
export function createEnrichedRecord(fields: {
  filePath: string;
  title?: string | null;
  genres?: readonly string[];
  plot?: string | null;
  durationMinutes: number;
}): EnrichedRecord {
  if (!Number.isInteger(fields.durationMinutes) || fields.durationMinutes < 0) {
    throw new RangeError(`Duration must be a non-negative integer, got ${fields.durationMinutes}`);
  }
  return Object.freeze({
    filePath: fields.filePath,
    title: fields.title ?? null,
    genres: Object.freeze([...(fields.genres ?? [])]),
    plot: fields.plot ?? null,
    durationMinutes: fields.durationMinutes,
  });
}

function isIterable(value: CacheSeed): value is Iterable<readonly [string, EnrichedRecord]> {
  return Symbol.iterator in value;
}

/**
 * Process-local cache. No eviction; size is bounded by the scanned library.
 */
export class InMemoryMetadataCache implements MetadataCache {
  private store: Map<string, EnrichedRecord>;

  constructor(initial?: CacheSeed) {
    if (!initial) {
      this.store = new Map();
    } else if (isIterable(initial)) {
      this.store = new Map(initial);
    } else {
      this.store = new Map(Object.entries(initial));
    }
  }

  get(key: string): EnrichedRecord | undefined {
    return this.store.get(key);
  }

  set(key: string, record: EnrichedRecord): void {
    this.store.set(key, record);
  }

  exists(key: string): boolean {
    return this.store.has(key);
  }

  clear(): void {
    this.store.clear();
  }

  getAll(): Map<string, EnrichedRecord> {
    return new Map(this.store);
  }

  get size(): number {
    return this.store.size;
  }
}
