import { describe, expect, it } from "vitest";
import { paramDistance } from "../src/metrics/distance.js";
import { computeRecoveryStats } from "../src/metrics/recovery.js";
import { quantileSorted, sortAscending } from "../src/metrics/quantile.js";
import { QualityError, QualityErrorCode } from "../src/errors.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof QualityError ? e.code : "NOT_A_QUALITY_ERROR";
  }
  return undefined;
}

describe("paramDistance", () => {
  const pTrue = [0.2, 0.3, 0.5, 0.6];

  it("measures a close point", () => {
    const d = paramDistance([0.201, 0.299, 0.498, 0.602], pTrue);
    expect(d).toBeCloseTo(Math.sqrt(1e-5), 10);
    expect(d).toBeLessThan(0.01);
  });

  it("is zero for identical vectors", () => {
    expect(paramDistance(pTrue, pTrue)).toBe(0);
    expect(paramDistance([], [])).toBe(0);
  });

  it("is symmetric", () => {
    const a = [1.5, -2, 0.25];
    const b = [-0.5, 3, 4];
    expect(paramDistance(a, b)).toBe(paramDistance(b, a));
  });

  it("computes the Euclidean norm", () => {
    expect(paramDistance([3, 4], [0, 0])).toBe(5);
  });

  it("fails on dimension mismatch", () => {
    for (const [n, m] of [
      [0, 1],
      [1, 2],
      [4, 3],
      [2, 5],
    ]) {
      expect(codeOf(() => paramDistance(new Array<number>(n).fill(0), new Array<number>(m).fill(0)))).toBe(
        QualityErrorCode.DIMENSION_MISMATCH,
      );
    }
  });
});

describe("computeRecoveryStats", () => {
  const truth = [0, 0];
  const points = [
    [0, 0],
    [3, 4],
    [0, 1],
  ];

  it("aggregates distances in input order", () => {
    const stats = computeRecoveryStats(points, truth, 1);
    expect(stats.all_distances).toEqual([0, 5, 1]);
    expect(stats.min_distance).toBe(0);
    expect(stats.mean_distance).toBe(2);
    expect(stats.num_recoveries).toBe(1);
  });

  it("counts only distances strictly below the threshold", () => {
    for (const threshold of [0, 1, 1.0001, 5, 5.5, Infinity]) {
      const stats = computeRecoveryStats(points, truth, threshold);
      expect(stats.num_recoveries).toBe(stats.all_distances.filter((d) => d < threshold).length);
    }
    expect(computeRecoveryStats(points, truth, 0).num_recoveries).toBe(0);
    expect(computeRecoveryStats(points, truth, Infinity).num_recoveries).toBe(3);
  });

  it("rejects an empty point set", () => {
    expect(codeOf(() => computeRecoveryStats([], truth, 1))).toBe(QualityErrorCode.EMPTY_INPUT);
  });

  it("rejects points of the wrong dimension", () => {
    expect(codeOf(() => computeRecoveryStats([[0, 0], [1, 2, 3]], truth, 1))).toBe(
      QualityErrorCode.DIMENSION_MISMATCH,
    );
  });
});

describe("quantileSorted", () => {
  it("interpolates between order statistics", () => {
    const sorted = [1, 2, 3, 4];
    expect(quantileSorted(sorted, 0)).toBe(1);
    expect(quantileSorted(sorted, 0.25)).toBe(1.75);
    expect(quantileSorted(sorted, 0.5)).toBe(2.5);
    expect(quantileSorted(sorted, 0.75)).toBe(3.25);
    expect(quantileSorted(sorted, 1)).toBe(4);
  });

  it("returns the single value of a one-element sample", () => {
    expect(quantileSorted([7], 0.25)).toBe(7);
  });

  it("rejects empty samples and bad probabilities", () => {
    expect(() => quantileSorted([], 0.5)).toThrow(RangeError);
    expect(() => quantileSorted([1], 1.5)).toThrow(RangeError);
  });

  it("sorts numerically without mutating the input", () => {
    const input = [10, 9, 100, 1];
    expect(sortAscending(input)).toEqual([1, 9, 10, 100]);
    expect(input).toEqual([10, 9, 100, 1]);
  });
});
