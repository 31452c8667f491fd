import type { EnrichedRecord } from '@/types';
import type { MovieResult } from '../types';

// Generate a unique request ID
export function generateRequestId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `req_${timestamp}${random}`;
}

// Serialize an enriched record for the API
export function formatMovie(record: EnrichedRecord): MovieResult {
  return {
    file_path: record.filePath,
    title: record.title,
    genres: [...record.genres],
    plot: record.plot,
    duration_minutes: record.durationMinutes,
  };
}
