/**
 * Property tests for duplicate matching invariants.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { findDuplicates } from '../../../../src/core/duplicates/matcher.js';
import { sequenceKey } from '../../../../src/core/duplicates/exact.js';
import { jaccardSimilarity } from '../../../../src/core/duplicates/jaccard.js';
import { block } from '../../../helpers/blocks.js';

const tokenArb = fc.constantFrom('a', 'b', 'c', 'd', '1', '"s"');
const tokensArb = fc.array(tokenArb, { minLength: 0, maxLength: 6 });

const blocksArb = fc
  .array(fc.tuple(tokensArb, fc.constantFrom('a.py', 'b.py', 'c.go')), { maxLength: 12 })
  .map((entries) => entries.map(([tokens, file], index) => block(tokens, file, index + 1)));

describe('duplicate matching properties', () => {
  it('jaccard is symmetric and bounded', () => {
    fc.assert(
      fc.property(tokensArb, tokensArb, (a, b) => {
        const forward = jaccardSimilarity(new Set(a), new Set(b));
        const backward = jaccardSimilarity(new Set(b), new Set(a));
        expect(forward).toBe(backward);
        expect(forward).toBeGreaterThanOrEqual(0);
        expect(forward).toBeLessThanOrEqual(1);
      })
    );
  });

  it('exact groups hold identical sequences at or above the size floor', () => {
    fc.assert(
      fc.property(blocksArb, fc.integer({ min: 0, max: 4 }), (blocks, minSize) => {
        const groups = findDuplicates(blocks, { minSize, strategy: 'exact' });
        const keys = new Set<string>();

        for (const group of groups) {
          expect(group.numDuplicates).toBe(group.locations.length);
          expect(group.numDuplicates).toBeGreaterThanOrEqual(2);
          expect(group.size).toBeGreaterThanOrEqual(minSize);
          expect(group.crossFile).toBe(new Set(group.locations.map((l) => l.file)).size > 1);
          keys.add(sequenceKey(group.tokens));
        }
        // one group per distinct sequence
        expect(keys.size).toBe(groups.length);
      })
    );
  });

  it('pairwise groups meet the similarity floor', () => {
    fc.assert(
      fc.property(blocksArb, fc.double({ min: 0, max: 1, noNaN: true }), (blocks, minSimilarity) => {
        const groups = findDuplicates(blocks, { minSize: 0, minSimilarity, strategy: 'pairwise' });

        for (const group of groups) {
          expect(group.numDuplicates).toBe(2);
          expect(group.similarity).toBeGreaterThanOrEqual(minSimilarity);
          expect(group.similarity).toBeLessThanOrEqual(1);
        }
      })
    );
  });
});
