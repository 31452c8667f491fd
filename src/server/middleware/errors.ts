import type { ErrorHandler, NotFoundHandler } from 'hono';
import type { AppEnv, ApiResponse } from '../types';
import { createLogger } from '@/lib/logger';

const logger = createLogger('HttpServer');

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

// Global error handler
export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  logger.child({ requestId: c.get('requestId') }).error('Unhandled error', err, {
    method: c.req.method,
    path: c.req.path,
  });

  const startTime = c.get('startTime');
  const response: ApiResponse = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: isDevelopment() ? err.message : 'An internal error occurred. Please try again later.',
      details: isDevelopment() ? { stack: err.stack } : undefined,
    },
    meta: {
      request_id: c.get('requestId') || 'unknown',
      took_ms: startTime ? Date.now() - startTime : 0,
    },
  };

  return c.json(response, 500);
};

// Not found handler
export const notFoundHandler: NotFoundHandler<AppEnv> = (c) => {
  const startTime = c.get('startTime');
  const response: ApiResponse = {
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: 'The requested endpoint does not exist.',
    },
    meta: {
      request_id: c.get('requestId') || 'unknown',
      took_ms: startTime ? Date.now() - startTime : 0,
    },
  };

  return c.json(response, 404);
};
