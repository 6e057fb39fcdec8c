/**
 * DuplicateMatcher - groups code blocks by the configured strategy.
 */
import type { CodeBlock } from '../blocks/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { ExactMatchStrategy } from './exact.js';
import { PairwiseMatchStrategy } from './pairwise.js';
import {
  MATCH_STRATEGIES,
  type DuplicateGroup,
  type MatchOptions,
  type MatchResult,
  type MatchStrategy,
  type MatchStrategyName,
} from './types.js';

export const DEFAULT_MIN_SIZE = 50;
export const DEFAULT_MIN_SIMILARITY = 0.8;
export const DEFAULT_STRATEGY: MatchStrategyName = 'exact';

/**
 * Create the strategy implementation for a name.
 */
export function createMatchStrategy(name: MatchStrategyName): MatchStrategy {
  switch (name) {
    case 'exact':
      return new ExactMatchStrategy();
    case 'pairwise':
      return new PairwiseMatchStrategy();
  }
}

export function isMatchStrategyName(value: string): value is MatchStrategyName {
  return MATCH_STRATEGIES.some((name) => name === value);
}

/**
 * Matches a complete, in-memory block list. Holds no state between calls.
 */
export class DuplicateMatcher {
  readonly minSize: number;
  readonly minSimilarity: number;
  private strategy: MatchStrategy;

  constructor(options: MatchOptions = {}) {
    this.minSize = options.minSize ?? DEFAULT_MIN_SIZE;
    this.minSimilarity = options.minSimilarity ?? DEFAULT_MIN_SIMILARITY;

    if (!Number.isInteger(this.minSize) || this.minSize < 0) {
      throw new ConfigError(
        ErrorCodes.INVALID_OPTION,
        `minSize must be a non-negative integer, got ${this.minSize}`,
        { minSize: this.minSize }
      );
    }
    if (!(this.minSimilarity >= 0 && this.minSimilarity <= 1)) {
      throw new ConfigError(
        ErrorCodes.INVALID_OPTION,
        `minSimilarity must be between 0 and 1, got ${this.minSimilarity}`,
        { minSimilarity: this.minSimilarity }
      );
    }

    this.strategy = createMatchStrategy(options.strategy ?? DEFAULT_STRATEGY);
  }

  get strategyName(): MatchStrategyName {
    return this.strategy.name;
  }

  /**
   * Find duplicate groups among the blocks.
   */
  match(blocks: readonly CodeBlock[]): DuplicateGroup[] {
    return this.matchWithStats(blocks).groups;
  }

  /**
   * Find duplicate groups and report what was filtered or compared.
   */
  matchWithStats(blocks: readonly CodeBlock[]): MatchResult {
    return this.strategy.match(blocks, this.minSize, this.minSimilarity);
  }
}

/**
 * One-shot helper around DuplicateMatcher.
 */
export function findDuplicates(
  blocks: readonly CodeBlock[],
  options: MatchOptions = {}
): DuplicateGroup[] {
  return new DuplicateMatcher(options).match(blocks);
}
