/**
 * Duplicate matching exports.
 */
export {
  DuplicateMatcher,
  findDuplicates,
  createMatchStrategy,
  isMatchStrategyName,
  DEFAULT_MIN_SIZE,
  DEFAULT_MIN_SIMILARITY,
  DEFAULT_STRATEGY,
} from './matcher.js';
export { ExactMatchStrategy, sequenceKey } from './exact.js';
export { PairwiseMatchStrategy } from './pairwise.js';
export { jaccardSimilarity, tokenSimilarity, exceedsSizeRatio } from './jaccard.js';
export { MATCH_STRATEGIES } from './types.js';
export type {
  DuplicateGroup,
  MatchOptions,
  MatchResult,
  MatchStats,
  MatchStrategy,
  MatchStrategyName,
} from './types.js';
