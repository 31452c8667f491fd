/**
 * Metadata Enrichment Module
 */

export {
  EnrichmentPipeline,
  createMovieRecord,
  DEFAULT_ENRICHMENT_CONCURRENCY,
  type EnrichmentPipelineOptions,
  type EnrichOptions,
} from './metadata-enrichment';
