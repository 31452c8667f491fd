/**
 * Media Info
 *
 * Extracts the technical duration of a video file with FFprobe.
 * Any failure yields 0 minutes and a warning. Only cancellation rejects, and
 * it kills the running FFprobe process.
 */

import { spawn } from 'node:child_process';
import { createLogger, type Logger } from '@/lib/logger';

/**
 * Duration extraction capability used by the library scanner
 */
export interface DurationExtractor {
  /** Duration in whole minutes, or 0 if unavailable; rejects only when the signal aborts */
  extractDurationMinutes(filePath: string, signal?: AbortSignal): Promise<number>;
}

/**
 * FFprobe JSON output format (only the fields we read)
 */
interface FFprobeOutput {
  format?: {
    duration?: string;
  };
  streams?: Array<{
    codec_type?: string;
    duration?: string;
  }>;
}

const FFPROBE_TIMEOUT_MS = 30_000;

/**
 * Convert seconds to whole minutes, rounding to the nearest minute
 */
export function secondsToMinutes(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return 0;
  }
  return Math.round(seconds / 60);
}

/**
 * Pick the duration in seconds from FFprobe output.
 * The container duration wins; otherwise the first video stream's.
 */
export function parseFFprobeDuration(output: FFprobeOutput): number | null {
  const candidates = [
    output.format?.duration,
    output.streams?.find((stream) => stream.codec_type === 'video')?.duration,
  ];
  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    const seconds = parseFloat(candidate);
    if (Number.isFinite(seconds)) {
      return seconds;
    }
  }
  return null;
}

/**
 * Run FFprobe against a file and resolve with its raw JSON output
 */
function runFFprobe(filePath: string, ffprobePath: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const ffprobe = spawn(
      ffprobePath,
      ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath],
      { signal }
    );

    let stdout = '';
    let stderr = '';

    const timeoutId = setTimeout(() => {
      ffprobe.kill('SIGKILL');
      reject(new Error(`FFprobe timed out after ${FFPROBE_TIMEOUT_MS}ms`));
    }, FFPROBE_TIMEOUT_MS);

    ffprobe.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    ffprobe.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    ffprobe.on('close', (code) => {
      clearTimeout(timeoutId);
      if (code !== 0) {
        reject(new Error(`FFprobe failed with code ${code}: ${stderr}`));
        return;
      }
      resolve(stdout);
    });

    ffprobe.on('error', (err) => {
      clearTimeout(timeoutId);
      reject(new Error(`Failed to spawn FFprobe: ${err.message}`));
    });
  });
}

export class FfprobeDurationExtractor implements DurationExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly ffprobePath = 'ffprobe',
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('MediaInfo');
  }

  async extractDurationMinutes(filePath: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();

    let output: FFprobeOutput;
    try {
      output = JSON.parse(await runFFprobe(filePath, this.ffprobePath, signal));
      if (!output || typeof output !== 'object') {
        throw new Error('FFprobe output is not a JSON object');
      }
    } catch (error) {
      signal?.throwIfAborted();
      this.logger.warn('Failed to extract duration', { filePath, error: String(error) });
      return 0;
    }

    const seconds = parseFFprobeDuration(output);
    if (seconds === null) {
      this.logger.warn('No duration found', { filePath });
      return 0;
    }

    return secondsToMinutes(seconds);
  }
}
