/** Experiment artifact types (experiment_config.json, results_summary.json, CSVs). */

export type ExperimentConfig = {
  dimension?: number;
  p_true?: number[] | null;
  basis?: string;
  [key: string]: unknown;
};

export type DegreeSummary = {
  degree: number;
  l2_error: number | null;
  critical_points: number | null;
};

export type ResultsSummary = {
  experiment_id: string;
  degrees: DegreeSummary[];
};

export type CriticalPointRow = {
  coordinates: number[];
  objective: number | null;
};

export type CriticalPointFormat = "raw" | "legacy";

export type CriticalPointSet = {
  degree: number;
  format: CriticalPointFormat;
  filePath: string;
  rows: CriticalPointRow[];
};
