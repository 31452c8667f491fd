/**
 * Media Info Tests
 *
 * FFprobe is replaced by a fake child process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock('node:child_process', () => ({
  spawn: spawnMock,
}));

import { FfprobeDurationExtractor, parseFFprobeDuration, secondsToMinutes } from './media-info';
import { Logger } from '@/lib/logger';

class FakeProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = vi.fn();
}

function respondWith(stdout: string, code = 0, stderr = ''): void {
  spawnMock.mockImplementationOnce(() => {
    const proc = new FakeProcess();
    queueMicrotask(() => {
      if (stdout) proc.stdout.emit('data', Buffer.from(stdout));
      if (stderr) proc.stderr.emit('data', Buffer.from(stderr));
      proc.emit('close', code);
    });
    return proc;
  });
}

describe('secondsToMinutes', () => {
  it('rounds to the nearest minute', () => {
    expect(secondsToMinutes(8160)).toBe(136);
    expect(secondsToMinutes(89)).toBe(1);
    expect(secondsToMinutes(29)).toBe(0);
  });

  it('returns 0 for non-positive or invalid values', () => {
    expect(secondsToMinutes(0)).toBe(0);
    expect(secondsToMinutes(-60)).toBe(0);
    expect(secondsToMinutes(Number.NaN)).toBe(0);
  });
});

describe('parseFFprobeDuration', () => {
  it('prefers the container duration', () => {
    expect(
      parseFFprobeDuration({
        format: { duration: '5400.25' },
        streams: [{ codec_type: 'video', duration: '5399.0' }],
      })
    ).toBe(5400.25);
  });

  it('falls back to the first video stream', () => {
    expect(
      parseFFprobeDuration({
        format: {},
        streams: [
          { codec_type: 'audio', duration: '100.0' },
          { codec_type: 'video', duration: '3600.0' },
        ],
      })
    ).toBe(3600);
  });

  it('returns null without any duration', () => {
    expect(parseFFprobeDuration({ format: { duration: 'N/A' }, streams: [] })).toBeNull();
    expect(parseFFprobeDuration({})).toBeNull();
  });
});

describe('FfprobeDurationExtractor', () => {
  const logger = new Logger({ service: 'MediaInfoTest' });

  beforeEach(() => {
    spawnMock.mockReset();
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the duration in minutes', async () => {
    respondWith(JSON.stringify({ format: { duration: '7620.4' }, streams: [] }));
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/heat.mkv')).resolves.toBe(127);
    expect(spawnMock).toHaveBeenCalledWith('ffprobe', [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '/movies/heat.mkv',
    ], { signal: undefined });
  });

  it('uses a custom binary path', async () => {
    respondWith(JSON.stringify({ format: { duration: '60' } }));
    const extractor = new FfprobeDurationExtractor('/opt/ffmpeg/ffprobe', logger);

    await extractor.extractDurationMinutes('/movies/short.mp4');

    expect(spawnMock.mock.calls[0][0]).toBe('/opt/ffmpeg/ffprobe');
  });

  it('returns 0 when FFprobe exits with an error', async () => {
    respondWith('', 1, 'Invalid data found when processing input');
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/broken.avi')).resolves.toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Failed to extract duration', {
      filePath: '/movies/broken.avi',
      error: 'Error: FFprobe failed with code 1: Invalid data found when processing input',
    });
  });

  it('returns 0 when FFprobe cannot be spawned', async () => {
    spawnMock.mockImplementationOnce(() => {
      const proc = new FakeProcess();
      queueMicrotask(() => proc.emit('error', new Error('spawn ffprobe ENOENT')));
      return proc;
    });
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/heat.mkv')).resolves.toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Failed to extract duration', {
      filePath: '/movies/heat.mkv',
      error: 'Error: Failed to spawn FFprobe: spawn ffprobe ENOENT',
    });
  });

  it('returns 0 on unparsable output', async () => {
    respondWith('not json');
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/heat.mkv')).resolves.toBe(0);
  });

  it('returns 0 on a JSON null document', async () => {
    respondWith('null');
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/heat.mkv')).resolves.toBe(0);
  });

  it('kills FFprobe and rejects when the signal aborts', async () => {
    let spawnedSignal: AbortSignal | undefined;
    spawnMock.mockImplementationOnce((_path: string, _args: string[], options: { signal?: AbortSignal }) => {
      const proc = new FakeProcess();
      spawnedSignal = options.signal;
      options.signal?.addEventListener('abort', () => {
        proc.emit('error', new Error('The operation was aborted'));
        proc.emit('close', null);
      });
      return proc;
    });
    const controller = new AbortController();
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    const pending = extractor.extractDurationMinutes('/movies/heat.mkv', controller.signal);
    controller.abort(new Error('scan cancelled'));

    await expect(pending).rejects.toThrow('scan cancelled');
    expect(spawnedSignal).toBe(controller.signal);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('does not spawn FFprobe after cancellation', async () => {
    const controller = new AbortController();
    controller.abort(new Error('scan cancelled'));
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/heat.mkv', controller.signal)).rejects.toThrow(
      'scan cancelled'
    );
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('returns 0 when no duration is reported', async () => {
    respondWith(JSON.stringify({ format: {}, streams: [] }));
    const extractor = new FfprobeDurationExtractor('ffprobe', logger);

    await expect(extractor.extractDurationMinutes('/movies/still.mkv')).resolves.toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('No duration found', { filePath: '/movies/still.mkv' });
  });
});
