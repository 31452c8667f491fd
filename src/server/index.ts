import { config } from 'dotenv';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { ConfigError, loadSettings, type Settings } from '@/lib/config';
import { LibraryService } from '@/lib/library';
import { createLogger } from '@/lib/logger';

// Load environment variables from .env file
config();

const logger = createLogger('Server');

function readSettings(): Settings {
  try {
    return loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', undefined, { errors: error.errors });
    } else {
      logger.error('Failed to load configuration', error);
    }
    process.exit(1);
  }
}

const settings = readSettings();
const library = new LibraryService({ settings });
const app = createApp({ library });

logger.info('Starting server', {
  port: settings.port,
  env: process.env.NODE_ENV || 'development',
  movieDirectory: settings.movieDirectory,
});

// Start server
const server = serve({
  fetch: app.fetch,
  port: settings.port,
});

logger.info('Server started', { port: settings.port, hostname: '0.0.0.0' });

library.startBackgroundIndexing();

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`Received ${signal}, shutting down`);
  await library.shutdown();
  server.close((error) => {
    if (error) {
      logger.error('Failed to close server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  });
}
