/**
 * OMDb Client
 *
 * Looks up a single movie by exact title (`?t=`) and shapes the response into
 * a {@link MovieLookupResult}. Transport failures, HTTP errors and "not found"
 * answers are all reported as `null` with a warning; callers never see them as
 * exceptions. Only cancellation through the caller's signal propagates.
 */

import type { MovieLookupResult } from '@/types';
import { createLogger, type Logger } from '@/lib/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Lookup capability used by the enrichment pipeline
 */
export interface MetadataSource {
  fetch(title: string, signal?: AbortSignal): Promise<MovieLookupResult | null>;
}

export interface OmdbClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * OMDb title lookup response (only the fields we read)
 */
interface OMDbTitleResponse {
  Response: string;
  Error?: string;
  Title?: string;
  Genre?: string;
  Plot?: string;
  Runtime?: string;
}

// ============================================================================
// Constants
// ============================================================================

export const OMDB_BASE_URL = 'https://www.omdbapi.com/';
export const OMDB_TIMEOUT_MS = 10_000;

/** OMDb placeholder for missing values */
const NOT_AVAILABLE = 'N/A';

// ============================================================================
// Response shaping
// ============================================================================

/**
 * Build OMDb title lookup URL
 */
export function buildOMDbTitleUrl(title: string, apiKey: string, baseUrl: string = OMDB_BASE_URL): string {
  const url = new URL(baseUrl);
  url.searchParams.set('t', title);
  url.searchParams.set('apikey', apiKey);
  return url.toString();
}

function textOrNull(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed === NOT_AVAILABLE) return null;
  return trimmed;
}

/**
 * Parse a comma-separated genre field
 * @example parseGenres('Action, Sci-Fi') // ['Action', 'Sci-Fi']
 */
export function parseGenres(value: string | undefined): string[] {
  if (!value || value.trim() === NOT_AVAILABLE) {
    return [];
  }
  return value
    .split(',')
    .map((genre) => genre.trim())
    .filter((genre) => genre.length > 0);
}

/**
 * Parse a free-text runtime such as "127 min" into whole minutes
 * @returns Minutes, or null when missing, a placeholder or unparsable
 */
export function parseRuntimeMinutes(value: string | undefined): number | null {
  if (!value || value.trim() === NOT_AVAILABLE) {
    return null;
  }
  const [first] = value.trim().split(/\s+/);
  if (!first || !/^\d+$/.test(first)) {
    return null;
  }
  return parseInt(first, 10);
}

function isTitleResponse(data: unknown): data is OMDbTitleResponse {
  if (typeof data !== 'object' || data === null || !('Response' in data)) {
    return false;
  }
  const record: Record<string, unknown> = { ...data };
  return (
    typeof record.Response === 'string' &&
    ['Error', 'Title', 'Genre', 'Plot', 'Runtime'].every(
      (field) => record[field] === undefined || typeof record[field] === 'string'
    )
  );
}

/**
 * Shape a successful OMDb title response
 */
export function parseOMDbTitleResponse(data: OMDbTitleResponse): MovieLookupResult {
  return {
    title: textOrNull(data.Title),
    genres: parseGenres(data.Genre),
    plot: textOrNull(data.Plot),
    runtimeMinutes: parseRuntimeMinutes(data.Runtime),
  };
}

// ============================================================================
// Client
// ============================================================================

export class OmdbClient implements MetadataSource {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: OmdbClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? OMDB_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? OMDB_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('OmdbClient');
  }

  /**
   * Look up a movie by title.
   *
   * @returns Shaped metadata, or null when the lookup failed or found nothing
   * @throws The signal's abort reason when the caller cancels
   */
  async fetch(title: string, signal?: AbortSignal): Promise<MovieLookupResult | null> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let data: unknown;
    try {
      const response = await fetch(buildOMDbTitleUrl(title, this.apiKey, this.baseUrl), {
        signal: controller.signal,
      });

      if (!response.ok) {
        this.logger.warn('OMDb HTTP error', { title, status: response.status });
        return null;
      }

      data = await response.json();
    } catch (error) {
      signal?.throwIfAborted();
      this.logger.warn('OMDb request failed', {
        title,
        error: controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : String(error),
      });
      return null;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!isTitleResponse(data)) {
      this.logger.warn('OMDb returned an unexpected payload', { title });
      return null;
    }

    if (data.Response !== 'True') {
      this.logger.warn('OMDb no result', { title, error: data.Error ?? null });
      return null;
    }

    return parseOMDbTitleResponse(data);
  }
}
