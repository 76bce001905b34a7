import type {
  L2Quality,
  ObjectiveDistributionResult,
  RecoveryStats,
  StagnationResult,
} from "./quality.js";

export type OverallVerdict = "pass" | "warn" | "fail";

export type ReportFormat = "human" | "jsonl" | "yaml" | "markdown";

export type DegreeReport = {
  degree: number;
  l2_error: number | null;
  l2_quality: L2Quality | null;
  num_critical_points: number | null;
  recovery: Omit<RecoveryStats, "all_distances"> | null;
  objective_distribution: ObjectiveDistributionResult | null;
};

export type QualityReport = {
  experiment_id: string;
  experiment_path: string;
  dimension: number | null;
  generated_at: string;
  has_ground_truth: boolean;
  degrees: DegreeReport[];
  stagnation: StagnationResult;
  overall: OverallVerdict;
  warnings: string[];
};

export type RecoveryTableRow = {
  degree: number;
  num_critical_points: number;
  min_distance: number;
  mean_distance: number;
  num_recoveries: number;
};

export type CampaignRecoveryStats = {
  num_experiments: number;
  best_min_distance: number;
  mean_min_distance: number;
  total_recoveries: number;
};

/** L2 and recovery aggregated over every experiment that reports a degree. */
export type CampaignDegreeStats = {
  degree: number;
  num_experiments: number;
  l2_min: number;
  l2_mean: number;
  l2_max: number;
  l2_std: number;
  best_experiment: string;
  worst_experiment: string;
  quality_counts: Record<L2Quality, number>;
  recovery: CampaignRecoveryStats | null;
};

export type CampaignExperimentRow = {
  key: string;
  experiment_id: string;
  overall: OverallVerdict;
  final_degree: number | null;
  final_l2: number | null;
  final_quality: L2Quality | null;
  is_stagnant: boolean;
};

export type CampaignError = { key: string; code: string; message: string };

export type CampaignSummary = {
  campaign: string;
  generated_at: string;
  num_experiments: number;
  verdicts: Record<OverallVerdict, number>;
  num_errors: number;
  stagnant_experiments: number;
  stagnant_fraction: number;
  degrees: CampaignDegreeStats[];
  experiments: CampaignExperimentRow[];
  errors: CampaignError[];
};
