import { QualityError, QualityErrorCode } from "../errors.js";

/** Euclidean distance ‖found − truth‖. */
export function paramDistance(found: readonly number[], truth: readonly number[]): number {
  if (found.length !== truth.length) {
    throw new QualityError(
      QualityErrorCode.DIMENSION_MISMATCH,
      `Parameter vectors must have the same dimension (found ${found.length}, expected ${truth.length})`,
      { found: found.length, expected: truth.length },
    );
  }

  let sum = 0;
  for (let i = 0; i < found.length; i++) {
    const d = found[i] - truth[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}
