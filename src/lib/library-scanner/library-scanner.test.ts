/**
 * Library Scanner Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LibraryScanner } from './library-scanner';
import type { DurationExtractor } from '@/lib/media-info';
import { Logger } from '@/lib/logger';

class FixedDurationExtractor implements DurationExtractor {
  calls: string[] = [];

  constructor(private readonly durations: Record<string, number> = {}) {}

  async extractDurationMinutes(filePath: string): Promise<number> {
    this.calls.push(filePath);
    return this.durations[path.basename(filePath)] ?? 0;
  }
}

describe('LibraryScanner', () => {
  let root: string;
  const logger = new Logger({ service: 'LibraryScannerTest' });

  function touch(...segments: string[]): string {
    const filePath = path.join(root, ...segments);
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, 'data');
    return filePath;
  }

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'library-scanner-'));
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    vi.spyOn(logger, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('finds supported files recursively in path order', async () => {
    const matrix = touch('The.Matrix.1999.mkv');
    const alien = touch('Sci-Fi', 'Alien.1979.MP4');
    const heat = touch('Crime', 'Heat', 'Heat.1995.avi');
    touch('notes.txt');
    touch('Crime', 'cover.jpg');

    const scanner = new LibraryScanner(new FixedDurationExtractor({ 'Heat.1995.avi': 170 }), { logger });
    const files = await scanner.scan(root);

    expect(files).toEqual([
      { filePath: heat, filename: 'Heat.1995.avi', durationMinutes: 170 },
      { filePath: alien, filename: 'Alien.1979.MP4', durationMinutes: 0 },
      { filePath: matrix, filename: 'The.Matrix.1999.mkv', durationMinutes: 0 },
    ]);
  });

  it('uses the configured extensions', async () => {
    const webm = touch('Clip.webm');
    touch('Movie.mkv');

    const scanner = new LibraryScanner(new FixedDurationExtractor(), { extensions: ['.WEBM'], logger });

    expect((await scanner.scan(root)).map((file) => file.filePath)).toEqual([webm]);
  });

  it('returns an empty list for a missing directory', async () => {
    const extractor = new FixedDurationExtractor();
    const scanner = new LibraryScanner(extractor, { logger });
    const missing = path.join(root, 'missing');

    await expect(scanner.scan(missing)).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Movie directory does not exist', { directory: missing });
    expect(extractor.calls).toEqual([]);
  });

  it('returns an empty list when the root is a file', async () => {
    const filePath = touch('movie.mp4');
    const scanner = new LibraryScanner(new FixedDurationExtractor(), { logger });

    await expect(scanner.scan(filePath)).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Movie path is not a directory', { directory: filePath });
  });

  it('degrades to zero duration when extraction throws', async () => {
    const filePath = touch('Broken.mkv');
    const extractor: DurationExtractor = {
      extractDurationMinutes: async () => {
        throw new Error('corrupt header');
      },
    };
    const scanner = new LibraryScanner(extractor, { logger });

    await expect(scanner.scan(root)).resolves.toEqual([
      { filePath, filename: 'Broken.mkv', durationMinutes: 0 },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('Failed to extract duration', {
      filePath,
      error: 'Error: corrupt header',
    });
  });

  it('ignores negative durations from the extractor', async () => {
    touch('Odd.mkv');
    const scanner = new LibraryScanner(new FixedDurationExtractor({ 'Odd.mkv': -3 }), { logger });

    const [file] = await scanner.scan(root);

    expect(file.durationMinutes).toBe(0);
  });

  it('stops between files when the signal aborts', async () => {
    touch('A.mkv');
    touch('B.mkv');
    touch('C.mkv');
    const controller = new AbortController();
    const calls: string[] = [];
    const extractor: DurationExtractor = {
      extractDurationMinutes: async (filePath) => {
        calls.push(path.basename(filePath));
        controller.abort(new Error('scan cancelled'));
        return 100;
      },
    };
    const scanner = new LibraryScanner(extractor, { logger });

    await expect(scanner.scan(root, { signal: controller.signal })).rejects.toThrow('scan cancelled');
    expect(calls).toEqual(['A.mkv']);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('passes the signal to the extractor', async () => {
    touch('A.mkv');
    const controller = new AbortController();
    const received: Array<AbortSignal | undefined> = [];
    const extractor: DurationExtractor = {
      extractDurationMinutes: async (_filePath, signal) => {
        received.push(signal);
        return 90;
      },
    };
    const scanner = new LibraryScanner(extractor, { logger });

    await scanner.scan(root, { signal: controller.signal });

    expect(received).toEqual([controller.signal]);
  });

  it('checks extensions case-insensitively', () => {
    const scanner = new LibraryScanner(new FixedDurationExtractor(), { logger });

    expect(scanner.isSupported('/movies/A.MKV')).toBe(true);
    expect(scanner.isSupported('/movies/A.mkv.part')).toBe(false);
  });
});
