import { Hono } from 'hono';
import type { AppEnv, HealthCheck } from '../types';
import type { LibraryService } from '@/lib/library';

export const VERSION = '1.0.0';

export function createHealthRoute(library: LibraryService) {
  const app = new Hono<AppEnv>();
  const startTime = Date.now();

  // GET /health - Health check
  app.get('/', (c) => {
    const status = library.status();
    const healthy = status.indexing.state !== 'failed';

    const health: HealthCheck = {
      status: healthy ? 'healthy' : 'degraded',
      version: VERSION,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      checks: {
        cache: status.cacheEnabled ? 'enabled' : 'disabled',
        indexing: status.indexing.state,
      },
      cached_records: status.cachedRecords,
      indexing: {
        started_at: status.indexing.startedAt,
        finished_at: status.indexing.finishedAt,
        error: status.indexing.error,
      },
    };

    return c.json(health, healthy ? 200 : 503);
  });

  return app;
}
