/**
 * Configuration Module
 *
 * Exports all configuration utilities and constants.
 */

export {
  loadSettings,
  parseList,
  ConfigError,
  DEFAULT_OMDB_BASE_URL,
  DEFAULT_VIDEO_EXTENSIONS,
  DEFAULT_INDEX_CONCURRENCY,
  DEFAULT_PORT,
  type Settings,
  type SettingsError,
} from './settings';
