import fs from "node:fs";
import path from "node:path";
import { QualityError, QualityErrorCode } from "../errors.js";
import { debug } from "../logger.js";
import {
  EXPERIMENT_CONFIG_FILE,
  hasGroundTruth,
  loadCriticalPointsForDegree,
  loadExperimentConfig,
  loadResultsSummary,
} from "../experiment/loader.js";
import { classifyL2 } from "../quality/l2-classifier.js";
import { detectStagnation } from "../quality/stagnation.js";
import { checkObjectiveDistribution } from "../quality/distribution.js";
import { recoveryRow } from "./recovery-table.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ThresholdStore } from "../thresholds/store.js";
import { THRESHOLD_CATEGORIES } from "../types/thresholds.js";
import type { CriticalPointSet, ExperimentConfig } from "../types/experiment.js";
import type { DegreeReport, OverallVerdict, QualityReport } from "../types/report.js";

export type QualityReportInput = {
  experimentPath: string;
  store: ThresholdStore;
  /** Overrides the dimension from experiment_config.json. */
  dimension?: number;
  registry?: SchemaRegistry;
  now?: Date;
};

/** Critical points for a degree, or null when the degree has no CSV. */
function tryLoadCriticalPoints(experimentPath: string, degree: number): CriticalPointSet | null {
  try {
    return loadCriticalPointsForDegree(experimentPath, degree);
  } catch (e) {
    if (e instanceof QualityError && e.code === QualityErrorCode.ARTIFACT_NOT_FOUND) return null;
    throw e;
  }
}

function verdict(degrees: DegreeReport[], stagnant: boolean): OverallVerdict {
  const graded = degrees.filter((d) => d.l2_quality !== null);
  const last = graded.length > 0 ? graded[graded.length - 1].l2_quality : null;

  if (stagnant || last === "poor") return "fail";
  if (last === "fair" || degrees.some((d) => d.objective_distribution?.quality === "poor")) return "warn";
  return "pass";
}

/**
 * Build the quality report for one experiment directory.
 *
 * 1. Load results_summary.json (and experiment_config.json when present)
 * 2. Per degree: grade L2, measure recovery against p_true, check objective outliers
 * 3. Run stagnation detection over degree → L2
 * 4. Derive the overall verdict
 */
export function buildQualityReport(input: QualityReportInput): QualityReport {
  const { experimentPath, store } = input;
  const registry = input.registry ?? defaultRegistry();
  const warnings: string[] = [];

  const summary = loadResultsSummary(experimentPath, registry);

  const config: ExperimentConfig | null = fs.existsSync(path.join(experimentPath, EXPERIMENT_CONFIG_FILE))
    ? loadExperimentConfig(experimentPath, registry)
    : null;
  const groundTruth = hasGroundTruth(experimentPath, registry);
  const truth = groundTruth ? (config?.p_true ?? null) : null;
  const recoveryThreshold = truth ? store.number(THRESHOLD_CATEGORIES.recovery, "recovery_threshold") : 0;

  const pointSets = new Map<number, CriticalPointSet | null>();
  for (const entry of summary.degrees) {
    const set = tryLoadCriticalPoints(experimentPath, entry.degree);
    if (!set) warnings.push(`No critical points file for degree ${entry.degree}`);
    pointSets.set(entry.degree, set);
  }

  const firstRows = [...pointSets.values()].find((s) => s !== null && s.rows.length > 0)?.rows;
  const dimension =
    input.dimension ?? config?.dimension ?? truth?.length ?? firstRows?.[0]?.coordinates.length ?? null;
  if (dimension === null) warnings.push("Problem dimension unknown; L2 quality not graded");

  const degrees: DegreeReport[] = summary.degrees.map((entry) => {
    const set = pointSets.get(entry.degree) ?? null;
    const rows = set?.rows ?? [];

    if (entry.l2_error === null) warnings.push(`No L2 error recorded for degree ${entry.degree}`);
    const l2Quality =
      entry.l2_error !== null && dimension !== null ? classifyL2(entry.l2_error, dimension, store) : null;

    let recovery: DegreeReport["recovery"] = null;
    if (truth && rows.length > 0) {
      const row = recoveryRow(entry.degree, rows, truth, recoveryThreshold);
      recovery = {
        min_distance: row.min_distance,
        mean_distance: row.mean_distance,
        num_recoveries: row.num_recoveries,
      };
    }

    const objectives = rows.flatMap((r) => (r.objective === null ? [] : [r.objective]));

    return {
      degree: entry.degree,
      l2_error: entry.l2_error,
      l2_quality: l2Quality,
      num_critical_points: set ? rows.length : entry.critical_points,
      recovery,
      objective_distribution: set ? checkObjectiveDistribution(objectives, store) : null,
    };
  });

  const l2ByDegree = new Map<number, number>();
  for (const d of degrees) {
    if (d.l2_error !== null) l2ByDegree.set(d.degree, d.l2_error);
  }
  const stagnation = detectStagnation(l2ByDegree, store);

  debug("report built", { experiment: summary.experiment_id, degrees: degrees.length });

  return {
    experiment_id: summary.experiment_id,
    experiment_path: path.resolve(experimentPath),
    dimension,
    generated_at: (input.now ?? new Date()).toISOString(),
    has_ground_truth: groundTruth,
    degrees,
    stagnation,
    overall: verdict(degrees, stagnation.is_stagnant),
    warnings,
  };
}
