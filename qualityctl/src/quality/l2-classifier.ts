import { THRESHOLD_CATEGORIES } from "../types/thresholds.js";
import { L2_QUALITY_LEVELS, type L2Quality } from "../types/quality.js";
import type { ThresholdStore } from "../thresholds/store.js";

/** Band multipliers applied to the dimension threshold, best band first. */
const BANDS: ReadonlyArray<[L2Quality, number]> = [
  ["excellent", 0.5],
  ["good", 1.0],
  ["fair", 2.0],
];

/** The `l2_norm_thresholds` entry for a dimension, or its `default`. */
export function l2ThresholdFor(dimension: number, store: ThresholdStore): number {
  return store.numberOr(THRESHOLD_CATEGORIES.l2, `dim_${dimension}`, "default");
}

/**
 * Grade an L2 approximation error against the dimension threshold t:
 * excellent < 0.5t ≤ good < t ≤ fair < 2t ≤ poor.
 */
export function classifyL2(l2Norm: number, dimension: number, store: ThresholdStore): L2Quality {
  const threshold = l2ThresholdFor(dimension, store);
  for (const [quality, factor] of BANDS) {
    if (l2Norm < factor * threshold) return quality;
  }
  return "poor";
}

/** Negative when `a` is better than `b`. */
export function compareL2Quality(a: L2Quality, b: L2Quality): number {
  return L2_QUALITY_LEVELS.indexOf(a) - L2_QUALITY_LEVELS.indexOf(b);
}
