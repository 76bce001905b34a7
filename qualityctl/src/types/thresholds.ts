/** Threshold configuration types. */

export type ThresholdValue =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "text"; value: string };

export type ThresholdCategory = ReadonlyMap<string, ThresholdValue>;

/** Plain form of a store, as written to JSON/YAML and validated by schema. */
export type ThresholdsDocument = Record<string, Record<string, number | string>>;

export const THRESHOLD_CATEGORIES = {
  l2: "l2_norm_thresholds",
  recovery: "parameter_recovery",
  convergence: "convergence",
  distribution: "objective_distribution",
} as const;

export type ConvergenceThresholds = {
  min_improvement_factor: number;
  stagnation_tolerance: number;
  absolute_improvement_threshold: number;
};

export type DistributionThresholds = {
  min_points_for_distribution_check: number;
  max_outlier_fraction: number;
  outlier_iqr_multiplier: number;
};
