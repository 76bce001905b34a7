/**
 * Quantile of an ascending-sorted sample by linear interpolation between
 * order statistics (h = (n − 1)·p).
 */
export function quantileSorted(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError("quantile of an empty sample");
  }
  if (p < 0 || p > 1) {
    throw new RangeError(`quantile probability out of range: ${p}`);
  }

  const h = (sorted.length - 1) * p;
  const lo = Math.floor(h);
  const hi = Math.ceil(h);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}
