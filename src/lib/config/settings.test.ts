/**
 * Settings Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadSettings, parseList, ConfigError, DEFAULT_OMDB_BASE_URL } from './settings';

let movieDirectory: string;

beforeAll(() => {
  movieDirectory = mkdtempSync(path.join(tmpdir(), 'settings-test-'));
});

afterAll(() => {
  rmSync(movieDirectory, { recursive: true, force: true });
});

function baseEnv(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
  return {
    MOVIE_DIRECTORY: movieDirectory,
    OMDB_API_KEY: 'test-key',
    ...overrides,
  };
}

function configErrorFields(env: NodeJS.ProcessEnv): string[] {
  try {
    loadSettings(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.errors.map((e) => e.field);
    }
    throw error;
  }
  return [];
}

describe('parseList', () => {
  it('returns an empty list for missing values', () => {
    expect(parseList(undefined)).toEqual([]);
    expect(parseList('')).toEqual([]);
  });

  it('trims entries and drops empty ones', () => {
    expect(parseList(' 1080p , BluRay ,, x265, ')).toEqual(['1080p', 'BluRay', 'x265']);
  });

  it('keeps compound entries intact', () => {
    expect(parseList('WEBRip-WORLD,Ac3 SNAKE,1080p')).toEqual(['WEBRip-WORLD', 'Ac3 SNAKE', '1080p']);
  });
});

describe('loadSettings', () => {
  it('loads required values and applies defaults', () => {
    const settings = loadSettings(baseEnv());

    expect(settings.movieDirectory).toBe(path.resolve(movieDirectory));
    expect(settings.omdbApiKey).toBe('test-key');
    expect(settings.omdbBaseUrl).toBe(DEFAULT_OMDB_BASE_URL);
    expect(settings.cacheFile).toBeNull();
    expect(settings.autoIndexOnStartup).toBe(true);
    expect(settings.enableCache).toBe(true);
    expect(settings.noiseTokens).toEqual([]);
    expect(settings.videoExtensions).toEqual(['.mp4', '.mkv', '.avi']);
    expect(settings.indexConcurrency).toBe(4);
    expect(settings.port).toBe(3333);
  });

  it('matches variable names case-insensitively', () => {
    const settings = loadSettings({
      movie_directory: movieDirectory,
      omdb_api_key: 'lower-key',
    });

    expect(settings.movieDirectory).toBe(path.resolve(movieDirectory));
    expect(settings.omdbApiKey).toBe('lower-key');
  });

  it('trims the API key', () => {
    expect(loadSettings(baseEnv({ OMDB_API_KEY: '  padded  ' })).omdbApiKey).toBe('padded');
  });

  it('parses boolean flags', () => {
    const settings = loadSettings(baseEnv({ AUTO_INDEX_ON_STARTUP: 'false', ENABLE_CACHE: 'No' }));

    expect(settings.autoIndexOnStartup).toBe(false);
    expect(settings.enableCache).toBe(false);
  });

  it('resolves the cache file path', () => {
    const settings = loadSettings(baseEnv({ CACHE_FILE: '/tmp/cache.json' }));
    expect(settings.cacheFile).toBe(path.resolve('/tmp/cache.json'));
  });

  it('parses the noise token list', () => {
    const settings = loadSettings(baseEnv({ FILENAME_NOISE_TOKENS: 'WEBRip-WORLD, Ac3 SNAKE ,,1080p' }));
    expect(settings.noiseTokens).toEqual(['WEBRip-WORLD', 'Ac3 SNAKE', '1080p']);
  });

  it('normalizes configured extensions', () => {
    const settings = loadSettings(baseEnv({ VIDEO_EXTENSIONS: 'MKV, .Webm' }));
    expect(settings.videoExtensions).toEqual(['.mkv', '.webm']);
  });

  it('reads numeric settings', () => {
    const settings = loadSettings(baseEnv({ INDEX_CONCURRENCY: '8', PORT: '8080' }));

    expect(settings.indexConcurrency).toBe(8);
    expect(settings.port).toBe(8080);
  });

  describe('validation', () => {
    it('requires the movie directory', () => {
      expect(configErrorFields({ OMDB_API_KEY: 'test-key' })).toEqual(['MOVIE_DIRECTORY']);
    });

    it('rejects a missing directory', () => {
      expect(() => loadSettings(baseEnv({ MOVIE_DIRECTORY: path.join(movieDirectory, 'missing') }))).toThrow(
        /does not exist/
      );
    });

    it('rejects a path that is not a directory', () => {
      const filePath = path.join(movieDirectory, 'notes.txt');
      writeFileSync(filePath, 'not a directory');

      expect(() => loadSettings(baseEnv({ MOVIE_DIRECTORY: filePath }))).toThrow(/is not a directory/);
    });

    it('rejects empty and whitespace API keys', () => {
      expect(() => loadSettings(baseEnv({ OMDB_API_KEY: '' }))).toThrow(/cannot be empty/);
      expect(() => loadSettings(baseEnv({ OMDB_API_KEY: '   ' }))).toThrow(/cannot be empty/);
    });

    it('reports every invalid field at once', () => {
      const fields = configErrorFields(
        baseEnv({
          OMDB_API_KEY: '',
          ENABLE_CACHE: 'maybe',
          INDEX_CONCURRENCY: '0',
          PORT: 'http',
          OMDB_BASE_URL: 'not a url',
        })
      );

      expect(fields).toEqual(['OMDB_API_KEY', 'OMDB_BASE_URL', 'ENABLE_CACHE', 'INDEX_CONCURRENCY', 'PORT']);
    });
  });
});
