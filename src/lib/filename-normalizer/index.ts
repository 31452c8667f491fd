/**
 * Filename Normalizer Module
 */

export {
  buildNoiseTokenSet,
  normalizeFilename,
  normalizeWithTokens,
  type NoiseTokenSet,
} from './filename-normalizer';
