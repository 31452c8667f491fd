import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppEnv } from './types';
import type { LibraryService } from '@/lib/library';
import { loggingMiddleware } from './middleware/logging';
import { errorHandler, notFoundHandler } from './middleware/errors';

// Routes
import { createMoviesRoute } from './routes/movies';
import { createHealthRoute, VERSION } from './routes/health';

export interface AppDependencies {
  library: LibraryService;
}

export function createApp({ library }: AppDependencies) {
  const app = new Hono<AppEnv>();

  // Global middleware
  app.use('*', cors());
  app.use('*', loggingMiddleware);

  // Error handling
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  app.route('/health', createHealthRoute(library));
  app.route('/movies', createMoviesRoute(library));

  // Root route
  app.get('/', (c) => {
    return c.json({
      name: 'Movie Library Indexer',
      version: VERSION,
      endpoints: {
        movies: 'GET /movies?sort=<field>&q=<keyword>',
        search: 'POST /movies/search',
        health: 'GET /health',
      },
    });
  });

  return app;
}
