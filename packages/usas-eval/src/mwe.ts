/**
 * All token indexes covered by a list of `[start, end)` MWE slices.
 * Overlapping slices are merged; a single-token MWE is `[i, i + 1)`.
 */
export function getAllMweTokenIndexes(slices: readonly (readonly [start: number, end: number])[]): ReadonlySet<number> {
  const indexes = new Set<number>();
  for (const [start, end] of slices) {
    for (let i = start; i < end; i++) indexes.add(i);
  }
  return indexes;
}
