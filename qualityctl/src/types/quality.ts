/** Quality assessment result types. */

export const L2_QUALITY_LEVELS = ["excellent", "good", "fair", "poor"] as const;
export type L2Quality = (typeof L2_QUALITY_LEVELS)[number];

export const DISTRIBUTION_QUALITY_LEVELS = ["good", "poor", "insufficient_data"] as const;
export type DistributionQuality = (typeof DISTRIBUTION_QUALITY_LEVELS)[number];

export type RecoveryStats = {
  readonly min_distance: number;
  readonly mean_distance: number;
  readonly num_recoveries: number;
  readonly all_distances: readonly number[];
};

export type StagnationResult = {
  readonly is_stagnant: boolean;
  readonly stagnation_start_degree: number | null;
  readonly stagnant_count: number;
  readonly improvement_factors: readonly number[];
};

export type ObjectiveDistributionResult = {
  readonly has_outliers: boolean;
  readonly num_outliers: number;
  readonly outlier_fraction: number;
  readonly quality: DistributionQuality;
  readonly q1: number;
  readonly q3: number;
  readonly iqr: number;
};

/** Degree → error. Record keys are parsed as integers. */
export type ErrorsByDegree = ReadonlyMap<number, number> | Readonly<Record<number, number>>;
