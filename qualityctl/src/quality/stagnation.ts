import { QualityError, QualityErrorCode } from "../errors.js";
import type { ErrorsByDegree, StagnationResult } from "../types/quality.js";
import { THRESHOLD_CATEGORIES, type ConvergenceThresholds } from "../types/thresholds.js";
import type { ThresholdStore } from "../thresholds/store.js";

const NOT_STAGNANT: StagnationResult = {
  is_stagnant: false,
  stagnation_start_degree: null,
  stagnant_count: 0,
  improvement_factors: [],
};

export function convergenceThresholds(store: ThresholdStore): ConvergenceThresholds {
  const c = THRESHOLD_CATEGORIES.convergence;
  return {
    min_improvement_factor: store.number(c, "min_improvement_factor"),
    stagnation_tolerance: store.number(c, "stagnation_tolerance"),
    absolute_improvement_threshold: store.number(c, "absolute_improvement_threshold"),
  };
}

function isDegreeMap(errors: ErrorsByDegree): errors is ReadonlyMap<number, number> {
  return errors instanceof Map;
}

/** Degree/error pairs sorted by ascending degree. */
export function sortedDegreeErrors(errors: ErrorsByDegree): Array<[number, number]> {
  const pairs: Array<[number, number]> =
    isDegreeMap(errors)
      ? [...errors.entries()]
      : Object.entries(errors).map(([k, v]): [number, number] => [Number(k), v]);

  for (const [degree, error] of pairs) {
    if (!Number.isInteger(degree)) {
      throw new QualityError(QualityErrorCode.INVALID_INPUT, `Degree must be an integer: ${degree}`, { degree });
    }
    if (!Number.isFinite(error) || error < 0) {
      throw new QualityError(
        QualityErrorCode.INVALID_INPUT,
        `Error for degree ${degree} must be a finite non-negative number: ${error}`,
        { degree, error },
      );
    }
  }

  return pairs.sort((a, b) => a[0] - b[0]);
}

/**
 * Ratio curr/prev. A zero previous error means the series got worse from an
 * exact fit, so the step is treated as growth (Infinity), or as no change
 * when both are zero.
 */
export function improvementFactor(prev: number, curr: number): number {
  if (prev === 0) return curr === 0 ? 1 : Infinity;
  return curr / prev;
}

/**
 * Walk degrees in ascending order and track the run of steps whose error
 * ratio stays at or above `min_improvement_factor`.
 *
 * A step landing below `absolute_improvement_threshold` counts as converged:
 * its factor is recorded as 0 and the run is reset. The reported start degree
 * and count describe the run still open at the last degree only.
 */
export function detectStagnation(errorsByDegree: ErrorsByDegree, store: ThresholdStore): StagnationResult {
  const t = convergenceThresholds(store);
  const series = sortedDegreeErrors(errorsByDegree);

  if (series.length < 2) return NOT_STAGNANT;

  const factors: number[] = [];
  let stagnantCount = 0;
  let stagnationStart: number | null = null;

  for (let i = 1; i < series.length; i++) {
    const [, prevError] = series[i - 1];
    const [degree, currError] = series[i];

    if (currError < t.absolute_improvement_threshold) {
      factors.push(0);
      stagnantCount = 0;
      stagnationStart = null;
      continue;
    }

    const factor = improvementFactor(prevError, currError);
    factors.push(factor);

    if (factor >= t.min_improvement_factor) {
      stagnantCount++;
      if (stagnationStart === null) stagnationStart = degree;
    } else {
      stagnantCount = 0;
      stagnationStart = null;
    }
  }

  return {
    is_stagnant: stagnantCount >= t.stagnation_tolerance,
    stagnation_start_degree: stagnationStart,
    stagnant_count: stagnantCount,
    improvement_factors: factors,
  };
}
