import { describe, it, expect } from 'vitest';
import { PairwiseMatchStrategy } from '../../../../src/core/duplicates/pairwise.js';
import { block } from '../../../helpers/blocks.js';

describe('PairwiseMatchStrategy', () => {
  const strategy = new PairwiseMatchStrategy();

  const small = block(['p', 'q'], 'z.py', 1);
  const first = block(['a', 'b', 'c', 'd'], 'x.py', 1, 4);
  const second = block(['a', 'b', 'c', 'e'], 'y.py', 2, 5);

  it('should pair blocks at or above the similarity floor', () => {
    const { groups, stats } = strategy.match([first, small, second], 0, 0.6);

    expect(groups).toEqual([
      {
        size: 4,
        numDuplicates: 2,
        locations: [
          { file: 'x.py', startLine: 1, endLine: 4 },
          { file: 'y.py', startLine: 2, endLine: 5 },
        ],
        crossFile: true,
        tokens: ['a', 'b', 'c', 'd'],
        similarity: 0.6,
      },
    ]);
    expect(stats.comparisons).toBe(1);
    expect(stats.prunedPairs).toBe(2);
  });

  it('should never score pairs pruned by the size ratio', () => {
    const { stats } = strategy.match([first, small, second], 0, 0.5);

    // gap 0.5 is not above 1 - 0.5, so every pair is scored
    expect(stats.prunedPairs).toBe(0);
    expect(stats.comparisons).toBe(3);
  });

  it('should drop pairs below the floor', () => {
    const { groups, stats } = strategy.match([first, second], 0, 0.7);

    expect(groups).toEqual([]);
    expect(stats.comparisons).toBe(1);
  });

  it('should apply the size floor before comparing', () => {
    const { groups, stats } = strategy.match([first, small, second], 3, 0.6);

    expect(stats.belowMinSize).toBe(1);
    expect(stats.prunedPairs).toBe(0);
    expect(groups).toHaveLength(1);
  });

  it('should report one group per qualifying pair', () => {
    const third = block(['a', 'b', 'c', 'd'], 'w.py', 8, 11);
    const { groups } = strategy.match([first, second, third], 0, 0.6);

    expect(groups.map((g) => [g.locations[0].file, g.locations[1].file, g.similarity])).toEqual([
      ['x.py', 'y.py', 0.6],
      ['x.py', 'w.py', 1],
      ['y.py', 'w.py', 0.6],
    ]);
  });

  it('should score blocks that differ in one literal', () => {
    const common = ['compute', 'total', 'price', 'qty', 'tax', 'rate', 'total', 'price', 'qty', 'tax'];
    const one = block([...common, '1'], 'one.py', 1, 3);
    const two = block([...common, '2'], 'two.py', 1, 3);
    const three = block([...common, '1'], 'three.py', 5, 7);

    const { groups, stats } = strategy.match([one, two, three], 5, 0.8);

    // {compute, total, price, qty, tax, rate} plus one literal each: 6 shared of 8 when literals differ
    expect(groups.map((g) => [g.locations[0].file, g.locations[1].file, g.similarity])).toEqual([
      ['one.py', 'three.py', 1],
    ]);
    expect(stats.comparisons).toBe(3);
  });

  it('should not mutate the input order', () => {
    const input = [second, small, first];
    strategy.match(input, 0, 0.6);
    expect(input).toEqual([second, small, first]);
  });
});
