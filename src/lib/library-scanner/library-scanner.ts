/**
 * Library Scanner
 *
 * Walks a movie directory recursively and returns the supported video files
 * with their technical duration. A missing root or a failed extraction never
 * aborts the scan; cancellation through the caller's signal does.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type { RawFile } from '@/types';
import type { DurationExtractor } from '@/lib/media-info';
import { DEFAULT_VIDEO_EXTENSIONS } from '@/lib/config';
import { createLogger, type Logger } from '@/lib/logger';

export interface LibraryScannerOptions {
  /** Extensions to include, with leading dot; matched case-insensitively */
  extensions?: readonly string[];
  logger?: Logger;
}

export interface ScanOptions {
  signal?: AbortSignal;
}

export class LibraryScanner {
  private readonly extensions: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(
    private readonly extractor: DurationExtractor,
    options: LibraryScannerOptions = {}
  ) {
    this.extensions = new Set((options.extensions ?? DEFAULT_VIDEO_EXTENSIONS).map((ext) => ext.toLowerCase()));
    this.logger = options.logger ?? createLogger('LibraryScanner');
  }

  /**
   * Scan a directory for supported video files.
   *
   * @returns Files in path order; empty when the root is missing or not a directory
   * @throws The signal's abort reason when cancelled
   */
  async scan(directory: string, options: ScanOptions = {}): Promise<RawFile[]> {
    const { signal } = options;
    signal?.throwIfAborted();

    const root = path.resolve(directory);
    const rootStats = await stat(root).catch(() => null);

    if (!rootStats) {
      this.logger.warn('Movie directory does not exist', { directory: root });
      return [];
    }
    if (!rootStats.isDirectory()) {
      this.logger.warn('Movie path is not a directory', { directory: root });
      return [];
    }

    const results: RawFile[] = [];
    for await (const filePath of this.walk(root)) {
      signal?.throwIfAborted();
      results.push({
        filePath,
        filename: path.basename(filePath),
        durationMinutes: await this.extractDuration(filePath, signal),
      });
    }

    this.logger.info('Scan complete', { directory: root, files: results.length });
    return results;
  }

  isSupported(filePath: string): boolean {
    return this.extensions.has(path.extname(filePath).toLowerCase());
  }

  private async *walk(directory: string): AsyncGenerator<string> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Failed to read directory', { directory, error: String(error) });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        yield* this.walk(fullPath);
      } else if (entry.isFile() && this.isSupported(entry.name)) {
        yield fullPath;
      }
    }
  }

  private async extractDuration(filePath: string, signal: AbortSignal | undefined): Promise<number> {
    try {
      const minutes = await this.extractor.extractDurationMinutes(filePath, signal);
      signal?.throwIfAborted();
      return Number.isInteger(minutes) && minutes > 0 ? minutes : 0;
    } catch (error) {
      signal?.throwIfAborted();
      this.logger.warn('Failed to extract duration', { filePath, error: String(error) });
      return 0;
    }
  }
}
