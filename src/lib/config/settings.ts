/**
 * Application Settings
 *
 * Loads and validates configuration from environment variables. Variable names
 * are matched case-insensitively, so `MOVIE_DIRECTORY` and `movie_directory`
 * are equivalent. Entrypoints load `.env` with dotenv before calling
 * {@link loadSettings}.
 */

import { statSync } from 'node:fs';
import path from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface Settings {
  /** Directory scanned for video files */
  movieDirectory: string;
  /** OMDb API key */
  omdbApiKey: string;
  omdbBaseUrl: string;
  /** Reserved for on-disk persistence; not read by the indexer */
  cacheFile: string | null;
  autoIndexOnStartup: boolean;
  enableCache: boolean;
  /** Raw noise token list, in configured order */
  noiseTokens: string[];
  /** Lower-cased extensions including the leading dot */
  videoExtensions: string[];
  indexConcurrency: number;
  port: number;
}

export interface SettingsError {
  field: string;
  message: string;
}

/**
 * Thrown when the environment does not describe a usable configuration
 */
export class ConfigError extends Error {
  constructor(public readonly errors: SettingsError[]) {
    super(`Invalid configuration: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_OMDB_BASE_URL = 'https://www.omdbapi.com/';
export const DEFAULT_VIDEO_EXTENSIONS = ['.mp4', '.mkv', '.avi'];
export const DEFAULT_INDEX_CONCURRENCY = 4;
export const DEFAULT_PORT = 3333;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

// ============================================================================
// Parsing helpers
// ============================================================================

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 * Entries containing spaces or hyphens are kept intact.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseBoolean(
  field: string,
  value: string | undefined,
  defaultValue: boolean,
  errors: SettingsError[]
): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  errors.push({ field, message: `Expected a boolean, got "${value}"` });
  return defaultValue;
}

function parseInteger(
  field: string,
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  errors: SettingsError[]
): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const trimmed = value.trim();
  const parsed = parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed < min || parsed > max) {
    errors.push({ field, message: `Must be an integer between ${min} and ${max}` });
    return defaultValue;
  }
  return parsed;
}

function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Build a lookup over the environment with lower-cased keys.
 * When a variable is present in several casings, the last one wins.
 */
function caseInsensitiveEnv(env: NodeJS.ProcessEnv): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      lookup.set(key.toLowerCase(), value);
    }
  }
  return lookup;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load settings from the given environment.
 *
 * @throws ConfigError listing every invalid or missing field
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const vars = caseInsensitiveEnv(env);
  const errors: SettingsError[] = [];

  const rawDirectory = vars.get('movie_directory')?.trim();
  let movieDirectory = '';
  if (!rawDirectory) {
    errors.push({ field: 'MOVIE_DIRECTORY', message: 'Movie directory is required' });
  } else {
    movieDirectory = path.resolve(rawDirectory);
    const stats = statSync(movieDirectory, { throwIfNoEntry: false });
    if (!stats) {
      errors.push({ field: 'MOVIE_DIRECTORY', message: `Movie directory does not exist: ${movieDirectory}` });
    } else if (!stats.isDirectory()) {
      errors.push({ field: 'MOVIE_DIRECTORY', message: `Movie directory is not a directory: ${movieDirectory}` });
    }
  }

  const omdbApiKey = vars.get('omdb_api_key')?.trim() ?? '';
  if (!omdbApiKey) {
    errors.push({ field: 'OMDB_API_KEY', message: 'OMDb API key cannot be empty' });
  }

  const omdbBaseUrl = vars.get('omdb_base_url')?.trim() || DEFAULT_OMDB_BASE_URL;
  if (!URL.canParse(omdbBaseUrl)) {
    errors.push({ field: 'OMDB_BASE_URL', message: `Not a valid URL: ${omdbBaseUrl}` });
  }

  const rawCacheFile = vars.get('cache_file')?.trim();
  const cacheFile = rawCacheFile ? path.resolve(rawCacheFile) : null;

  const autoIndexOnStartup = parseBoolean('AUTO_INDEX_ON_STARTUP', vars.get('auto_index_on_startup'), true, errors);
  const enableCache = parseBoolean('ENABLE_CACHE', vars.get('enable_cache'), true, errors);

  const extensions = parseList(vars.get('video_extensions'));
  const videoExtensions = extensions.length > 0 ? extensions.map(normalizeExtension) : [...DEFAULT_VIDEO_EXTENSIONS];

  const indexConcurrency = parseInteger(
    'INDEX_CONCURRENCY',
    vars.get('index_concurrency'),
    DEFAULT_INDEX_CONCURRENCY,
    1,
    32,
    errors
  );
  const port = parseInteger('PORT', vars.get('port'), DEFAULT_PORT, 1, 65535, errors);

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return {
    movieDirectory,
    omdbApiKey,
    omdbBaseUrl,
    cacheFile,
    autoIndexOnStartup,
    enableCache,
    noiseTokens: parseList(vars.get('filename_noise_tokens')),
    videoExtensions,
    indexConcurrency,
    port,
  };
}
