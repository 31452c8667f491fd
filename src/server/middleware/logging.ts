import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types';
import { generateRequestId } from '../utils/format';
import { getLogLevel } from '@/lib/logger';

// Request logging middleware
export const loggingMiddleware: MiddlewareHandler<AppEnv> = async (c, next) => {
  const requestId = generateRequestId();
  const startTime = Date.now();

  // Set context variables
  c.set('requestId', requestId);
  c.set('startTime', startTime);

  // Set request ID header
  c.header('X-Request-ID', requestId);

  if (getLogLevel() === 'debug') {
    console.log(
      JSON.stringify({
        level: 'debug',
        ts: new Date().toISOString(),
        msg: 'request started',
        request_id: requestId,
        method: c.req.method,
        path: c.req.path,
        ip: getClientIp(c),
      })
    );
  }

  await next();

  console.log(
    JSON.stringify({
      level: 'info',
      ts: new Date().toISOString(),
      msg: 'request completed',
      request_id: requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - startTime,
      ip: getClientIp(c),
    })
  );
};

// Get client IP from proxy headers
function getClientIp(c: { req: { header: (name: string) => string | undefined } }): string {
  return (
    c.req.header('X-Forwarded-For')?.split(',')[0]?.trim() ||
    c.req.header('X-Real-IP') ||
    'unknown'
  );
}
