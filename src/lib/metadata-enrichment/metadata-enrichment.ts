/**
 * Metadata Enrichment Pipeline
 *
 * Turns scanned files into enriched records:
 * - cached paths are returned as-is, without a lookup
 * - other files have their name normalized into a search title
 * - the metadata source is queried and its result merged with the
 *   technical duration
 * - the record is cached under the file's absolute path
 *
 * Lookups run in batches of `concurrency`. Source failures never reject the
 * run; only cancellation through the caller's signal does.
 */

import type { EnrichedRecord, MovieLookupResult, RawFile } from '@/types';
import type { MetadataSource } from '@/lib/omdb';
import { createEnrichedRecord, type MetadataCache } from '@/lib/movie-cache';
import { buildNoiseTokenSet, normalizeWithTokens, type NoiseTokenSet } from '@/lib/filename-normalizer';
import { createLogger, type Logger } from '@/lib/logger';

// ============================================================================
// Types
// ============================================================================

export interface EnrichmentPipelineOptions {
  source: MetadataSource;
  cache: MetadataCache;
  /** Configured filename noise tokens, single and compound */
  noiseTokens?: readonly string[];
  /** Maximum lookups in flight at once (default: 4) */
  concurrency?: number;
  logger?: Logger;
}

export interface EnrichOptions {
  signal?: AbortSignal;
}

export const DEFAULT_ENRICHMENT_CONCURRENCY = 4;

// ============================================================================
// Record merging
// ============================================================================

/**
 * Merge a scanned file with its lookup result.
 *
 * The technical duration wins; the source runtime is only used when the file
 * reported 0 minutes.
 */
export function createMovieRecord(file: RawFile, lookup: MovieLookupResult | null): EnrichedRecord {
  if (!lookup) {
    return createEnrichedRecord({
      filePath: file.filePath,
      durationMinutes: file.durationMinutes,
    });
  }

  const runtime = lookup.runtimeMinutes;
  const useRuntime =
    file.durationMinutes === 0 && runtime !== null && Number.isInteger(runtime) && runtime >= 0;

  return createEnrichedRecord({
    filePath: file.filePath,
    title: lookup.title,
    genres: lookup.genres,
    plot: lookup.plot,
    durationMinutes: useRuntime ? runtime : file.durationMinutes,
  });
}

// ============================================================================
// Pipeline
// ============================================================================

interface RunStats {
  cacheHits: number;
  lookups: number;
  misses: number;
}

export class EnrichmentPipeline {
  private readonly source: MetadataSource;
  private readonly cache: MetadataCache;
  private readonly noiseTokens: NoiseTokenSet;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(options: EnrichmentPipelineOptions) {
    const concurrency = options.concurrency ?? DEFAULT_ENRICHMENT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    this.source = options.source;
    this.cache = options.cache;
    this.noiseTokens = buildNoiseTokenSet(options.noiseTokens ?? []);
    this.concurrency = concurrency;
    this.logger = options.logger ?? createLogger('EnrichmentPipeline');
  }

  /**
   * Enrich files in input order.
   *
   * @returns One record per input file
   * @throws The signal's abort reason when cancelled; files not yet
   *   completed are left uncached
   */
  async enrich(files: readonly RawFile[], options: EnrichOptions = {}): Promise<EnrichedRecord[]> {
    const { signal } = options;
    const inFlight = new Map<string, Promise<EnrichedRecord>>();
    const stats: RunStats = { cacheHits: 0, lookups: 0, misses: 0 };
    const results: EnrichedRecord[] = [];

    signal?.throwIfAborted();
    this.logger.debug('Enriching files', { files: files.length, concurrency: this.concurrency });

    for (let i = 0; i < files.length; i += this.concurrency) {
      const batch = files.slice(i, i + this.concurrency);
      const records = await Promise.all(
        batch.map((file) => this.enrichFile(file, inFlight, stats, signal))
      );
      results.push(...records);
    }

    this.logger.info('Enrichment complete', { files: files.length, ...stats });
    return results;
  }

  private async enrichFile(
    file: RawFile,
    inFlight: Map<string, Promise<EnrichedRecord>>,
    stats: RunStats,
    signal: AbortSignal | undefined
  ): Promise<EnrichedRecord> {
    signal?.throwIfAborted();

    const key = file.filePath;
    const cached = this.cache.get(key);
    if (cached) {
      stats.cacheHits++;
      return cached;
    }

    const pending = inFlight.get(key);
    if (pending) {
      return pending;
    }

    const lookup = this.lookupAndStore(file, stats, signal);
    inFlight.set(key, lookup);
    return lookup;
  }

  private async lookupAndStore(
    file: RawFile,
    stats: RunStats,
    signal: AbortSignal | undefined
  ): Promise<EnrichedRecord> {
    const title = normalizeWithTokens(file.filePath, this.noiseTokens);
    stats.lookups++;

    let lookup: MovieLookupResult | null;
    try {
      lookup = await this.source.fetch(title, signal);
    } catch (error) {
      signal?.throwIfAborted();
      this.logger.error('Metadata source failed', error, { filePath: file.filePath, title });
      lookup = null;
    }

    signal?.throwIfAborted();

    if (!lookup) {
      stats.misses++;
    }

    const record = createMovieRecord(file, lookup);
    this.cache.set(file.filePath, record);
    return record;
  }
}
