import { QualityError, QualityErrorCode } from "../errors.js";
import type { RecoveryStats } from "../types/quality.js";
import { paramDistance } from "./distance.js";

/**
 * Distance of every found point to the ground truth, with min/mean and the
 * number of points strictly closer than `recoveryThreshold`.
 *
 * Throws EMPTY_INPUT for no points and DIMENSION_MISMATCH for a point whose
 * length differs from `truth`.
 */
export function computeRecoveryStats(
  points: ReadonlyArray<readonly number[]>,
  truth: readonly number[],
  recoveryThreshold: number,
): RecoveryStats {
  if (points.length === 0) {
    throw new QualityError(
      QualityErrorCode.EMPTY_INPUT,
      "Cannot compute recovery statistics without any critical points",
    );
  }

  const distances = points.map((p) => paramDistance(p, truth));

  let min = Infinity;
  let sum = 0;
  let recoveries = 0;
  for (const d of distances) {
    if (d < min) min = d;
    sum += d;
    if (d < recoveryThreshold) recoveries++;
  }

  return {
    min_distance: min,
    mean_distance: sum / distances.length,
    num_recoveries: recoveries,
    all_distances: distances,
  };
}
