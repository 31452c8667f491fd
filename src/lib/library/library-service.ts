/**
 * Library Service
 *
 * Owns the shared cache, the settings and the background indexing task, and
 * answers listing queries for the HTTP layer. One instance per process; tests
 * build their own with fakes.
 */

import type { EnrichedRecord } from '@/types';
import type { Settings } from '@/lib/config';
import { InMemoryMetadataCache, type MetadataCache } from '@/lib/movie-cache';
import { OmdbClient, type MetadataSource } from '@/lib/omdb';
import { FfprobeDurationExtractor } from '@/lib/media-info';
import { LibraryScanner } from '@/lib/library-scanner';
import { EnrichmentPipeline } from '@/lib/metadata-enrichment';
import { searchMovies, DEFAULT_SORT } from '@/lib/movie-search';
import { createLogger, type Logger } from '@/lib/logger';
import { IndexingTask, IndexingCancelledError, type IndexingStatus } from './indexing-task';

// ============================================================================
// Types
// ============================================================================

export type FileScanner = Pick<LibraryScanner, 'scan'>;

export interface LibraryServiceOptions {
  settings: Settings;
  cache?: MetadataCache;
  scanner?: FileScanner;
  source?: MetadataSource;
  logger?: Logger;
}

export interface ListMoviesOptions {
  keywords?: readonly string[];
  sort?: string;
  signal?: AbortSignal;
}

export interface IndexOptions {
  /** Cache to fill; defaults to the shared cache */
  cache?: MetadataCache;
  signal?: AbortSignal;
}

export interface LibraryStatus {
  cachedRecords: number;
  cacheEnabled: boolean;
  indexing: IndexingStatus;
}

/**
 * Signal that aborts when any of the given signals aborts. `dispose` detaches
 * the listeners once the caller is done.
 */
function linkSignals(...signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach((cleanup) => cleanup()),
  };
}

// ============================================================================
// Service
// ============================================================================

export class LibraryService {
  readonly settings: Settings;
  readonly cache: MetadataCache;
  readonly indexingTask: IndexingTask;
  private readonly scanner: FileScanner;
  private readonly source: MetadataSource;
  private readonly logger: Logger;
  private readonly shutdownController = new AbortController();

  constructor(options: LibraryServiceOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? createLogger('LibraryService');
    this.cache = options.cache ?? new InMemoryMetadataCache();
    this.scanner =
      options.scanner ??
      new LibraryScanner(new FfprobeDurationExtractor('ffprobe', this.logger.child({ service: 'MediaInfo' })), {
        extensions: this.settings.videoExtensions,
        logger: this.logger.child({ service: 'LibraryScanner' }),
      });
    this.source =
      options.source ??
      new OmdbClient({
        apiKey: this.settings.omdbApiKey,
        baseUrl: this.settings.omdbBaseUrl,
        logger: this.logger.child({ service: 'OmdbClient' }),
      });
    this.indexingTask = new IndexingTask(
      async (signal) => {
        await this.indexLibrary({ signal });
      },
      this.logger.child({ service: 'IndexingTask' })
    );
  }

  /**
   * Scan the movie directory and enrich every file found.
   */
  async indexLibrary(options: IndexOptions = {}): Promise<EnrichedRecord[]> {
    const { signal } = options;
    const cache = options.cache ?? this.cache;

    const startTime = Date.now();
    const files = await this.scanner.scan(this.settings.movieDirectory, { signal });
    signal?.throwIfAborted();

    const pipeline = new EnrichmentPipeline({
      source: this.source,
      cache,
      noiseTokens: this.settings.noiseTokens,
      concurrency: this.settings.indexConcurrency,
      logger: this.logger.child({ service: 'EnrichmentPipeline' }),
    });
    const records = await pipeline.enrich(files, { signal });

    this.logger.info('Library indexed', {
      directory: this.settings.movieDirectory,
      records: records.length,
      duration: `${Date.now() - startTime}ms`,
    });
    return records;
  }

  /**
   * Start background indexing into the shared cache when the settings ask
   * for it.
   * @returns true when a run was started
   */
  startBackgroundIndexing(): boolean {
    if (!this.settings.autoIndexOnStartup || !this.settings.enableCache) {
      this.logger.info('Background indexing disabled', {
        autoIndexOnStartup: this.settings.autoIndexOnStartup,
        enableCache: this.settings.enableCache,
      });
      return false;
    }
    return this.indexingTask.start();
  }

  /**
   * List movies filtered by keywords and sorted by a field expression.
   *
   * With caching on, the shared cache is read; an empty cache waits once for
   * the in-flight background run. With caching off and auto-indexing on,
   * every call runs a full scan and enrichment into a throwaway cache.
   *
   * Rejects with the abort reason when the caller's signal aborts or the
   * service shuts down first.
   */
  async listMovies(options: ListMoviesOptions = {}): Promise<EnrichedRecord[]> {
    const { signal, dispose } = linkSignals(options.signal, this.shutdownController.signal);
    try {
      const records = await this.loadRecords(signal);
      signal.throwIfAborted();
      return searchMovies(records, options.keywords ?? [], options.sort ?? DEFAULT_SORT);
    } finally {
      dispose();
    }
  }

  status(): LibraryStatus {
    return {
      cachedRecords: this.cache.size,
      cacheEnabled: this.settings.enableCache,
      indexing: this.indexingTask.status(),
    };
  }

  /**
   * Abort in-flight listings, cancel background indexing and wait for it to
   * stop.
   */
  async shutdown(): Promise<void> {
    if (!this.shutdownController.signal.aborted) {
      this.shutdownController.abort(new IndexingCancelledError());
    }
    await this.indexingTask.cancel();
  }

  private async loadRecords(signal: AbortSignal): Promise<EnrichedRecord[]> {
    if (!this.settings.enableCache) {
      if (!this.settings.autoIndexOnStartup) {
        return [];
      }
      return this.indexLibrary({ cache: new InMemoryMetadataCache(), signal });
    }

    if (this.cache.size === 0 && this.indexingTask.running) {
      this.logger.debug('Cache empty, waiting for background indexing');
      await this.indexingTask.wait();
    }

    return [...this.cache.getAll().values()];
  }
}
