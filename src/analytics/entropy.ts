/**
 * Shannon entropy, in bits, of the empirical distribution of `values`.
 *
 * Entropy of source addresses is a standard flood indicator: a distributed
 * attack spreads traffic over many sources and pushes it up, while a single
 * heavy hitter pulls it down.
 */
export function shannonEntropy(values: Iterable<string>): number {
  const freq = new Map<string, number>();
  let total = 0;
  for (const value of values) {
    freq.set(value, (freq.get(value) ?? 0) + 1);
    total++;
  }
  if (total === 0) return 0;

  let entropy = 0;
  for (const count of freq.values()) {
    const p = count / total;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

/** Entropy scaled to [0, 1] by the maximum for the number of distinct values. */
export function normalizedEntropy(values: Iterable<string>): number {
  const list = [...values];
  const distinct = new Set(list).size;
  if (distinct <= 1) return 0;
  return shannonEntropy(list) / Math.log2(distinct);
}
