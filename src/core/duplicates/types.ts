/**
 * Duplicate matching types.
 */
import type { CodeBlock, SourceLocation } from '../blocks/types.js';

/**
 * A cluster of two or more blocks judged equivalent by the active strategy.
 *
 * Invariants: `numDuplicates === locations.length >= 2`, `crossFile` is true
 * iff the locations span more than one file, `similarity` is in [0, 1].
 */
export interface DuplicateGroup {
  readonly size: number;
  readonly numDuplicates: number;
  readonly locations: readonly SourceLocation[];
  readonly crossFile: boolean;
  /** Representative token sequence */
  readonly tokens: readonly string[];
  readonly similarity: number;
}

export type MatchStrategyName = 'exact' | 'pairwise';

export const MATCH_STRATEGIES: readonly MatchStrategyName[] = ['exact', 'pairwise'];

export interface MatchOptions {
  /** Inclusive token-count floor (default: 50) */
  minSize?: number;
  /** Jaccard floor in [0, 1], pairwise only (default: 0.8) */
  minSimilarity?: number;
  /** Matching algorithm (default: 'exact') */
  strategy?: MatchStrategyName;
}

export interface MatchStats {
  /** Blocks handed to the matcher */
  received: number;
  /** Blocks dropped for being malformed */
  malformed: number;
  /** Blocks dropped by the size floor */
  belowMinSize: number;
  /** Similarity computations performed (pairwise only) */
  comparisons: number;
  /** Pairs skipped by the size-ratio check (pairwise only) */
  prunedPairs: number;
}

export interface MatchResult {
  groups: DuplicateGroup[];
  stats: MatchStats;
}

/**
 * A duplicate matching algorithm. Implementations are pure: the same input
 * always yields the same groups, and the input array is never mutated.
 */
export interface MatchStrategy {
  readonly name: MatchStrategyName;
  match(blocks: readonly CodeBlock[], minSize: number, minSimilarity: number): MatchResult;
}
