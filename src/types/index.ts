/**
 * Core type definitions for the movie library
 */

/**
 * A video file found on disk, before enrichment
 */
export interface RawFile {
  /** Absolute path; identity of the file */
  readonly filePath: string;
  /** File name including extension */
  readonly filename: string;
  /** Technical duration in whole minutes, 0 when unknown */
  readonly durationMinutes: number;
}

/**
 * A file merged with metadata from the lookup source.
 * Records are frozen on construction and never mutated.
 */
export interface EnrichedRecord {
  readonly filePath: string;
  readonly title: string | null;
  readonly genres: readonly string[];
  readonly plot: string | null;
  readonly durationMinutes: number;
}

/**
 * Metadata returned by a successful source lookup
 */
export interface MovieLookupResult {
  title: string | null;
  genres: string[];
  plot: string | null;
  /** Runtime in minutes, null when missing or unparsable */
  runtimeMinutes: number | null;
}
