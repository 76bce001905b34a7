import type { ObjectiveDistributionResult } from "../types/quality.js";
import { THRESHOLD_CATEGORIES, type DistributionThresholds } from "../types/thresholds.js";
import type { ThresholdStore } from "../thresholds/store.js";
import { quantileSorted, sortAscending } from "../metrics/quantile.js";

export function distributionThresholds(store: ThresholdStore): DistributionThresholds {
  const c = THRESHOLD_CATEGORIES.distribution;
  return {
    min_points_for_distribution_check: store.number(c, "min_points_for_distribution_check"),
    max_outlier_fraction: store.number(c, "max_outlier_fraction"),
    outlier_iqr_multiplier: store.number(c, "outlier_iqr_multiplier"),
  };
}

/**
 * IQR outlier check on objective values.
 *
 * Values strictly outside [Q1 − k·IQR, Q3 + k·IQR] are outliers; the sample
 * is "good" while their fraction stays at or below `max_outlier_fraction`.
 */
export function checkObjectiveDistribution(
  objectives: readonly number[],
  store: ThresholdStore,
): ObjectiveDistributionResult {
  const t = distributionThresholds(store);
  const n = objectives.length;

  if (n < t.min_points_for_distribution_check || n === 0) {
    return {
      has_outliers: false,
      num_outliers: 0,
      outlier_fraction: 0,
      quality: "insufficient_data",
      q1: 0,
      q3: 0,
      iqr: 0,
    };
  }

  const sorted = sortAscending(objectives);
  const q1 = quantileSorted(sorted, 0.25);
  const q3 = quantileSorted(sorted, 0.75);
  const iqr = q3 - q1;

  const lower = q1 - t.outlier_iqr_multiplier * iqr;
  const upper = q3 + t.outlier_iqr_multiplier * iqr;
  const numOutliers = objectives.filter((v) => v < lower || v > upper).length;
  const fraction = numOutliers / n;

  return {
    has_outliers: numOutliers > 0,
    num_outliers: numOutliers,
    outlier_fraction: fraction,
    quality: fraction <= t.max_outlier_fraction ? "good" : "poor",
    q1,
    q3,
    iqr,
  };
}
