/**
 * Movie Cache Module
 */

export {
  InMemoryMetadataCache,
  createEnrichedRecord,
  type MetadataCache,
  type CacheSeed,
} from './movie-cache';
