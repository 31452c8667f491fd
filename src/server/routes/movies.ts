import { Hono, type Context } from 'hono';
import type { AppEnv, ApiResponse, MovieListParams, MovieListResults } from '../types';
import type { LibraryService } from '@/lib/library';
import { validateListParams, validateSearchBody, type ValidationResult } from '../utils/validate';
import { formatMovie } from '../utils/format';

function meta(c: Context<AppEnv>) {
  return {
    request_id: c.get('requestId'),
    took_ms: Date.now() - c.get('startTime'),
  };
}

function invalidParams(c: Context<AppEnv>, message: string, validation: ValidationResult) {
  const response: ApiResponse = {
    success: false,
    error: {
      code: 'INVALID_PARAMS',
      message,
      details: {
        errors: validation.errors,
      },
    },
    meta: meta(c),
  };
  return c.json(response, 400);
}

export function createMoviesRoute(library: LibraryService) {
  const app = new Hono<AppEnv>();

  async function respondWithMovies(c: Context<AppEnv>, params: MovieListParams) {
    const records = await library.listMovies({
      keywords: params.keywords,
      sort: params.sort,
      signal: c.req.raw.signal,
    });

    const response: ApiResponse<MovieListResults> = {
      success: true,
      data: {
        total: records.length,
        results: records.map(formatMovie),
      },
      meta: meta(c),
    };
    return c.json(response);
  }

  // GET /movies - List movies
  app.get('/', async (c) => {
    const validation = validateListParams({
      keywords: c.req.queries('q') ?? [],
      sort: c.req.query('sort'),
    });

    if (!validation.valid || !validation.parsed) {
      return invalidParams(c, 'Invalid listing parameters.', validation);
    }

    return respondWithMovies(c, validation.parsed);
  });

  // POST /movies/search - Search movies by keywords
  app.post('/search', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return invalidParams(c, 'Request body must be valid JSON.', {
        valid: false,
        errors: [{ field: 'body', message: 'Malformed JSON' }],
        parsed: null,
      });
    }

    const validation = validateSearchBody(body);
    if (!validation.valid || !validation.parsed) {
      return invalidParams(c, 'Invalid search parameters.', validation);
    }

    return respondWithMovies(c, validation.parsed);
  });

  return app;
}
