/**
 * Block pre-filtering shared by every matching strategy.
 */
import { isWellFormedBlock, type CodeBlock, type SourceLocation } from '../blocks/types.js';
import type { MatchStats } from './types.js';

export interface Candidates {
  blocks: CodeBlock[];
  stats: MatchStats;
}

/**
 * Drop malformed blocks and blocks below the inclusive size floor,
 * keeping input order.
 */
export function selectCandidates(blocks: readonly unknown[], minSize: number): Candidates {
  const stats: MatchStats = {
    received: blocks.length,
    malformed: 0,
    belowMinSize: 0,
    comparisons: 0,
    prunedPairs: 0,
  };
  const kept: CodeBlock[] = [];

  for (const block of blocks) {
    if (!isWellFormedBlock(block)) {
      stats.malformed++;
      continue;
    }
    if (block.tokens.length < minSize) {
      stats.belowMinSize++;
      continue;
    }
    kept.push(block);
  }

  return { blocks: kept, stats };
}

/**
 * Whether the locations span more than one file.
 */
export function spansFiles(locations: readonly SourceLocation[]): boolean {
  return new Set(locations.map((loc) => loc.file)).size > 1;
}

/**
 * Copy a location so groups never share objects with the caller's blocks.
 */
export function copyLocation(location: SourceLocation): SourceLocation {
  return Object.freeze({
    file: location.file,
    startLine: location.startLine,
    endLine: location.endLine,
  });
}
