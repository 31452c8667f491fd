// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface ResponseMeta {
  request_id: string;
  took_ms: number;
}

export type ErrorCode = 'INVALID_PARAMS' | 'NOT_FOUND' | 'INTERNAL_ERROR';

// Movie Types
export interface MovieResult {
  file_path: string;
  title: string | null;
  genres: string[];
  plot: string | null;
  duration_minutes: number;
}

export interface MovieListParams {
  keywords: string[];
  sort: string;
}

export interface MovieListResults {
  total: number;
  results: MovieResult[];
}

// Health Check Types
export interface HealthCheck {
  status: 'healthy' | 'degraded';
  version: string;
  uptime_seconds: number;
  checks: {
    cache: 'enabled' | 'disabled';
    indexing: 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';
  };
  cached_records: number;
  indexing: {
    started_at: string | null;
    finished_at: string | null;
    error: string | null;
  };
}

// Context Types (for Hono middleware)
export interface AppVariables {
  requestId: string;
  startTime: number;
}

export type AppEnv = { Variables: AppVariables };
