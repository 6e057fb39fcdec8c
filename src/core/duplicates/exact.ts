/**
 * Exact-hash grouping: blocks whose full token sequences are identical.
 * Linear in block count; only ever reports similarity 1.
 */
import type { CodeBlock } from '../blocks/types.js';
import { selectCandidates, spansFiles, copyLocation } from './candidates.js';
import type { DuplicateGroup, MatchResult, MatchStrategy } from './types.js';

/**
 * Identity key of a token sequence. Order- and repetition-sensitive, and
 * unambiguous for tokens containing separators.
 */
export function sequenceKey(tokens: readonly string[]): string {
  return JSON.stringify(tokens);
}

export class ExactMatchStrategy implements MatchStrategy {
  readonly name = 'exact' as const;

  match(blocks: readonly CodeBlock[], minSize: number): MatchResult {
    const { blocks: candidates, stats } = selectCandidates(blocks, minSize);

    // Map preserves insertion order: groups come out in first-seen order
    const byKey = new Map<string, CodeBlock[]>();
    for (const block of candidates) {
      const key = sequenceKey(block.tokens);
      const members = byKey.get(key);
      if (members) {
        members.push(block);
      } else {
        byKey.set(key, [block]);
      }
    }

    const groups: DuplicateGroup[] = [];
    for (const members of byKey.values()) {
      if (members.length < 2) continue;

      const locations = members.map((b) => copyLocation(b.location));
      const tokens = [...members[0].tokens];
      groups.push({
        size: tokens.length,
        numDuplicates: members.length,
        locations,
        crossFile: spansFiles(locations),
        tokens,
        similarity: 1,
      });
    }

    return { groups, stats };
  }
}
