import { loadCriticalPointsForDegree } from "../experiment/loader.js";
import { computeRecoveryStats } from "../metrics/recovery.js";
import type { CriticalPointRow } from "../types/experiment.js";
import type { RecoveryTableRow } from "../types/report.js";

/** Recovery row for one degree from its critical points. */
export function recoveryRow(
  degree: number,
  rows: readonly CriticalPointRow[],
  truth: readonly number[],
  recoveryThreshold: number,
): RecoveryTableRow {
  const stats = computeRecoveryStats(
    rows.map((r) => r.coordinates),
    truth,
    recoveryThreshold,
  );
  return {
    degree,
    num_critical_points: rows.length,
    min_distance: stats.min_distance,
    mean_distance: stats.mean_distance,
    num_recoveries: stats.num_recoveries,
  };
}

/**
 * Parameter recovery per degree, in the order `degrees` is given.
 *
 * Every degree must have a critical points file with at least one row.
 */
export function generateParameterRecoveryTable(
  experimentPath: string,
  truth: readonly number[],
  degrees: readonly number[],
  recoveryThreshold: number,
): RecoveryTableRow[] {
  return degrees.map((degree) =>
    recoveryRow(degree, loadCriticalPointsForDegree(experimentPath, degree).rows, truth, recoveryThreshold),
  );
}
