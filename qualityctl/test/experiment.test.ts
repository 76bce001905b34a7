import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  hasGroundTruth,
  loadCriticalPointsForDegree,
  loadExperimentConfig,
  loadResultsSummary,
} from "../src/experiment/loader.js";
import { discoverExperiments } from "../src/experiment/discovery.js";
import { QualityError, QualityErrorCode } from "../src/errors.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof QualityError ? e.code : "NOT_A_QUALITY_ERROR";
  }
  return undefined;
}

describe("experiment config", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "qualityctl-cfg-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    fs.writeFileSync(path.join(tmpDir, "experiment_config.json"), content);
  }

  it("loads p_true, dimension and basis", () => {
    writeConfig(JSON.stringify({ p_true: [0.2, 0.3, 0.5, 0.6], dimension: 4, basis: "chebyshev", GN: 8 }));
    const config = loadExperimentConfig(tmpDir);
    expect(config.p_true).toEqual([0.2, 0.3, 0.5, 0.6]);
    expect(config.dimension).toBe(4);
    expect(config.basis).toBe("chebyshev");
    expect(config["GN"]).toBe(8);
    expect(hasGroundTruth(tmpDir)).toBe(true);
  });

  it("fails when the config file is missing", () => {
    expect(codeOf(() => loadExperimentConfig(tmpDir))).toBe(QualityErrorCode.EXPERIMENT_NOT_FOUND);
    expect(hasGroundTruth(tmpDir)).toBe(false);
  });

  it("has no ground truth when p_true is null or absent", () => {
    writeConfig(JSON.stringify({ p_true: null, dimension: 2 }));
    expect(hasGroundTruth(tmpDir)).toBe(false);
    writeConfig(JSON.stringify({ dimension: 2 }));
    expect(hasGroundTruth(tmpDir)).toBe(false);
  });

  it("rejects malformed JSON, but the ground truth probe answers false", () => {
    writeConfig("{ \"p_true\": [0.1, ");
    expect(codeOf(() => loadExperimentConfig(tmpDir))).toBe(QualityErrorCode.INVALID_ARTIFACT);
    expect(hasGroundTruth(tmpDir)).toBe(false);
  });

  it("rejects configs that do not match the schema", () => {
    writeConfig(JSON.stringify({ dimension: "four" }));
    expect(codeOf(() => loadExperimentConfig(tmpDir))).toBe(QualityErrorCode.INVALID_ARTIFACT);
  });
});

describe("results summary", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "qualityctl-sum-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeSummary(data: unknown): void {
    fs.writeFileSync(path.join(tmpDir, "results_summary.json"), JSON.stringify(data));
  }

  it("reads the array layout, sorted by degree", () => {
    writeSummary([
      { degree: 6, l2_approx_error: 0.2 },
      { degree: 4, l2_approx_error: 0.5, critical_points: 9 },
    ]);
    const summary = loadResultsSummary(tmpDir);
    expect(summary.experiment_id).toBe(path.basename(tmpDir));
    expect(summary.degrees).toEqual([
      { degree: 4, l2_error: 0.5, critical_points: 9 },
      { degree: 6, l2_error: 0.2, critical_points: null },
    ]);
  });

  it("reads the results_summary map layout", () => {
    writeSummary({
      experiment_id: "exp-a",
      results_summary: { degree_5: { l2_norm: 0.1 }, degree_4: { l2_error: 0.3 }, notes: {} },
    });
    const summary = loadResultsSummary(tmpDir);
    expect(summary.experiment_id).toBe("exp-a");
    expect(summary.degrees).toEqual([
      { degree: 4, l2_error: 0.3, critical_points: null },
      { degree: 5, l2_error: 0.1, critical_points: null },
    ]);
  });

  it("reads the degree_results layout", () => {
    writeSummary({ degree_results: [{ degree: 3, l2_approx_error: 1.5, l2_error: 9, critical_points: [[1, 2]] }] });
    expect(loadResultsSummary(tmpDir).degrees).toEqual([{ degree: 3, l2_error: 1.5, critical_points: 1 }]);
  });

  it("rejects entries without a degree", () => {
    writeSummary([{ l2_approx_error: 1 }]);
    expect(codeOf(() => loadResultsSummary(tmpDir))).toBe(QualityErrorCode.INVALID_ARTIFACT);
  });

  it("rejects a summary with no recognisable degree entries", () => {
    writeSummary({ results: [{ degree: 4, l2: 5 }] });
    expect(codeOf(() => loadResultsSummary(tmpDir))).toBe(QualityErrorCode.INVALID_ARTIFACT);
    writeSummary([]);
    expect(codeOf(() => loadResultsSummary(tmpDir))).toBe(QualityErrorCode.INVALID_ARTIFACT);
  });

  it("fails when the summary is missing", () => {
    expect(codeOf(() => loadResultsSummary(tmpDir))).toBe(QualityErrorCode.EXPERIMENT_NOT_FOUND);
  });
});

describe("critical points CSV", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "qualityctl-csv-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads the raw format", () => {
    fs.writeFileSync(
      path.join(tmpDir, "critical_points_raw_deg_4.csv"),
      "index,p1,p2,objective\n1,0.1,0.2,3.5\n2,0.3,0.4,1.25\n",
    );
    const set = loadCriticalPointsForDegree(tmpDir, 4);
    expect(set.format).toBe("raw");
    expect(set.degree).toBe(4);
    expect(set.rows).toEqual([
      { coordinates: [0.1, 0.2], objective: 3.5 },
      { coordinates: [0.3, 0.4], objective: 1.25 },
    ]);
  });

  it("loads the legacy format with columns ordered by index", () => {
    fs.writeFileSync(path.join(tmpDir, "critical_points_deg_6.csv"), "x2,x1,z\n2,1,-0.5\n");
    const set = loadCriticalPointsForDegree(tmpDir, 6);
    expect(set.format).toBe("legacy");
    expect(set.rows).toEqual([{ coordinates: [1, 2], objective: -0.5 }]);
  });

  it("prefers the raw file when both exist", () => {
    fs.writeFileSync(path.join(tmpDir, "critical_points_raw_deg_8.csv"), "p1,objective\n1,2\n");
    fs.writeFileSync(path.join(tmpDir, "critical_points_deg_8.csv"), "x1,z\n9,9\n");
    expect(loadCriticalPointsForDegree(tmpDir, 8).rows).toEqual([{ coordinates: [1], objective: 2 }]);
  });

  it("leaves the objective empty when the column is absent", () => {
    fs.writeFileSync(path.join(tmpDir, "critical_points_raw_deg_2.csv"), "p1,p2\n0.5,0.5\n");
    expect(loadCriticalPointsForDegree(tmpDir, 2).rows).toEqual([{ coordinates: [0.5, 0.5], objective: null }]);
  });

  it("fails when neither file exists", () => {
    expect(codeOf(() => loadCriticalPointsForDegree(tmpDir, 10))).toBe(QualityErrorCode.ARTIFACT_NOT_FOUND);
  });

  it("fails on non-numeric coordinates", () => {
    fs.writeFileSync(path.join(tmpDir, "critical_points_raw_deg_4.csv"), "p1,p2,objective\n0.1,oops,1\n");
    expect(codeOf(() => loadCriticalPointsForDegree(tmpDir, 4))).toBe(QualityErrorCode.INVALID_ARTIFACT);
  });

  it("fails when no coordinate columns are present", () => {
    fs.writeFileSync(path.join(tmpDir, "critical_points_raw_deg_4.csv"), "a,b\n1,2\n");
    expect(codeOf(() => loadCriticalPointsForDegree(tmpDir, 4))).toBe(QualityErrorCode.INVALID_ARTIFACT);
  });
});

describe("experiment discovery", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "qualityctl-disc-"));
    for (const dir of ["lv4d_a", "sweep/lv4d_b", "sweep/other", ".hidden"]) {
      fs.mkdirSync(path.join(root, dir), { recursive: true });
      fs.writeFileSync(path.join(root, dir, "results_summary.json"), "[]");
    }
    fs.mkdirSync(path.join(root, "empty"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("finds directories holding a results summary", () => {
    expect(discoverExperiments(root)).toEqual([
      path.join(root, "lv4d_a"),
      path.join(root, "sweep/lv4d_b"),
      path.join(root, "sweep/other"),
    ]);
  });

  it("filters by glob on the relative path", () => {
    expect(discoverExperiments(root, { filter: "sweep/**" })).toEqual([
      path.join(root, "sweep/lv4d_b"),
      path.join(root, "sweep/other"),
    ]);
    expect(discoverExperiments(root, { filter: "**/lv4d_*" })).toEqual([
      path.join(root, "lv4d_a"),
      path.join(root, "sweep/lv4d_b"),
    ]);
  });

  it("respects the depth limit", () => {
    expect(discoverExperiments(root, { maxDepth: 1 })).toEqual([path.join(root, "lv4d_a")]);
  });

  it("returns nothing for a missing root", () => {
    expect(discoverExperiments(path.join(root, "missing"))).toEqual([]);
  });
});
