/**
 * Token-set similarity.
 */

/**
 * Jaccard index of two token sets: |A ∩ B| / |A ∪ B|.
 * Order and repetition are ignored. Two empty sets score 0.
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];

  let intersection = 0;
  for (const token of smaller) {
    if (larger.has(token)) intersection++;
  }

  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Jaccard index of two token sequences.
 */
export function tokenSimilarity(a: readonly string[], b: readonly string[]): number {
  return jaccardSimilarity(new Set(a), new Set(b));
}

/**
 * Whether two block sizes are too far apart to ever reach `minSimilarity`.
 */
export function exceedsSizeRatio(sizeA: number, sizeB: number, minSimilarity: number): boolean {
  const largest = Math.max(sizeA, sizeB);
  if (largest === 0) return false;
  return Math.abs(sizeA - sizeB) / largest > 1 - minSimilarity;
}
