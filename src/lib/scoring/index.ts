/**
 * Scoring Engine - Hierarchical variant prioritization
 */

export {
  type RankingOptions,
  type RankingResult,
  applyDominanceOverride,
  comparePriorityKeys,
  scoreVariant,
  rankVariants,
  isValidVariantScore,
  formatVariantScore,
} from './engine';

export { type RankingConfigurationErrorCode, RankingConfigurationError } from './errors';
