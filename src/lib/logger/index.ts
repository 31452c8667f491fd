/**
 * Logger Module
 *
 * Centralized logging for the movie library indexer.
 */

export {
  Logger,
  createLogger,
  formatError,
  getLogLevel,
  type LogLevel,
  type LogContext,
  type FormattedError,
} from './logger';
