/**
 * Pairwise similarity matching over token sets.
 *
 * Blocks are compared in ascending size order; pairs whose sizes differ by
 * more than (1 - minSimilarity) proportionally are never scored. O(n²).
 */
import type { CodeBlock } from '../blocks/types.js';
import { selectCandidates, spansFiles, copyLocation } from './candidates.js';
import { jaccardSimilarity, exceedsSizeRatio } from './jaccard.js';
import type { DuplicateGroup, MatchResult, MatchStrategy } from './types.js';

interface SizedBlock {
  block: CodeBlock;
  size: number;
  tokenSet: Set<string>;
}

export class PairwiseMatchStrategy implements MatchStrategy {
  readonly name = 'pairwise' as const;

  match(blocks: readonly CodeBlock[], minSize: number, minSimilarity: number): MatchResult {
    const { blocks: candidates, stats } = selectCandidates(blocks, minSize);

    // Array.prototype.sort is stable, so equal sizes keep input order
    const sorted: SizedBlock[] = candidates
      .map((block) => ({ block, size: block.tokens.length, tokenSet: new Set(block.tokens) }))
      .sort((a, b) => a.size - b.size);

    const groups: DuplicateGroup[] = [];

    for (let i = 0; i < sorted.length; i++) {
      const first = sorted[i];

      for (let j = i + 1; j < sorted.length; j++) {
        const second = sorted[j];

        if (exceedsSizeRatio(first.size, second.size, minSimilarity)) {
          stats.prunedPairs++;
          continue;
        }

        stats.comparisons++;
        const similarity = jaccardSimilarity(first.tokenSet, second.tokenSet);
        if (similarity < minSimilarity) continue;

        const locations = [copyLocation(first.block.location), copyLocation(second.block.location)];
        groups.push({
          size: first.size,
          numDuplicates: 2,
          locations,
          crossFile: spansFiles(locations),
          tokens: [...first.block.tokens],
          similarity,
        });
      }
    }

    return { groups, stats };
  }
}
