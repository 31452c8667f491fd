#!/usr/bin/env npx tsx

/**
 * Library Indexing Script
 *
 * Scans the movie directory, enriches every file with OMDb metadata and
 * prints the resulting library.
 *
 * Usage:
 *   npx tsx scripts/index-library.ts
 *
 * Options:
 *   --json          Print the records as JSON instead of a table
 *   --sort=FIELD    Sort expression, e.g. duration or -title (default: duration)
 *   --q=KEYWORD     Only print movies matching KEYWORD (repeatable)
 *
 * Required environment variables:
 *   - MOVIE_DIRECTORY: Directory to scan
 *   - OMDB_API_KEY: OMDb API key
 */

import { config } from 'dotenv';

// Load environment variables from .env file
config();
import { ConfigError, loadSettings, type Settings } from '../src/lib/config';
import { LibraryService } from '../src/lib/library';
import { searchMovies, DEFAULT_SORT } from '../src/lib/movie-search';
import { createLogger } from '../src/lib/logger';
import type { EnrichedRecord } from '../src/types';

// ============================================================================
// Types
// ============================================================================

interface ScriptOptions {
  json: boolean;
  sort: string;
  keywords: string[];
}

// ============================================================================
// Helpers
// ============================================================================

function parseArgs(args: string[]): ScriptOptions {
  const options: ScriptOptions = {
    json: false,
    sort: DEFAULT_SORT,
    keywords: [],
  };

  for (const arg of args) {
    if (arg === '--json') {
      options.json = true;
    } else if (arg.startsWith('--sort=')) {
      options.sort = arg.slice('--sort='.length) || DEFAULT_SORT;
    } else if (arg.startsWith('--q=')) {
      options.keywords.push(arg.slice('--q='.length));
    }
  }

  return options;
}

function formatRow(record: EnrichedRecord): string {
  const duration = `${record.durationMinutes} min`.padStart(8);
  const title = record.title ?? '(unknown)';
  const genres = record.genres.length > 0 ? ` [${record.genres.join(', ')}]` : '';
  return `${duration}  ${title}${genres}\n          ${record.filePath}`;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const logger = createLogger('IndexLibrary');

  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const { field, message } of error.errors) {
        console.error(`Invalid ${field}: ${message}`);
      }
      process.exit(1);
    }
    throw error;
  }

  const library = new LibraryService({ settings, logger });
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const records = await logger.withTiming(
    'Index library',
    () => library.indexLibrary({ signal: controller.signal }),
    { directory: settings.movieDirectory }
  );
  const results = searchMovies(records, options.keywords, options.sort);

  if (options.json) {
    console.log(JSON.stringify(results, null, 2));
    return;
  }

  console.log(`\n${results.length} movie(s) in ${settings.movieDirectory}\n`);
  for (const record of results) {
    console.log(formatRow(record));
  }
}

main().catch((error) => {
  console.error('\nFatal error:', error);
  process.exit(1);
});
