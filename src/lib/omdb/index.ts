/**
 * OMDb Module
 *
 * Metadata source capability and its OMDb implementation.
 */

export {
  OmdbClient,
  buildOMDbTitleUrl,
  parseGenres,
  parseRuntimeMinutes,
  parseOMDbTitleResponse,
  OMDB_BASE_URL,
  OMDB_TIMEOUT_MS,
  type MetadataSource,
  type OmdbClientOptions,
} from './omdb-client';
