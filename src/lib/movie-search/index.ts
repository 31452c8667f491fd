/**
 * Movie Search Module
 */

export {
  searchMovies,
  parseSort,
  matchesKeywords,
  normalizeKeywords,
  DEFAULT_SORT,
  type SortField,
  type SortSpec,
} from './movie-search';
