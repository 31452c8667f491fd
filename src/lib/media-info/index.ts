/**
 * Media Info Module
 */

export {
  FfprobeDurationExtractor,
  parseFFprobeDuration,
  secondsToMinutes,
  type DurationExtractor,
} from './media-info';
