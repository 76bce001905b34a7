import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { QualityError, QualityErrorCode } from "../errors.js";
import { debug } from "../logger.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type {
  CriticalPointFormat,
  CriticalPointRow,
  CriticalPointSet,
  DegreeSummary,
  ExperimentConfig,
  ResultsSummary,
} from "../types/experiment.js";

export const EXPERIMENT_CONFIG_FILE = "experiment_config.json";
export const RESULTS_SUMMARY_FILE = "results_summary.json";

function readJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, "utf8");
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new QualityError(
      QualityErrorCode.INVALID_ARTIFACT,
      `Malformed JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      { path: filePath },
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertValid(registry: SchemaRegistry, schema: string, data: unknown, filePath: string): void {
  const { valid, errors } = registry.validate(schema, data);
  if (!valid) {
    throw new QualityError(
      QualityErrorCode.INVALID_ARTIFACT,
      `${path.basename(filePath)} does not match ${schema} schema: ${errors}`,
      { path: filePath, schema },
    );
  }
}

/** Read and validate `experiment_config.json`. */
export function loadExperimentConfig(
  experimentPath: string,
  registry: SchemaRegistry = defaultRegistry(),
): ExperimentConfig {
  const file = path.join(experimentPath, EXPERIMENT_CONFIG_FILE);
  if (!fs.existsSync(file)) {
    throw new QualityError(
      QualityErrorCode.EXPERIMENT_NOT_FOUND,
      `Config file not found: ${file}`,
      { path: file },
    );
  }

  const data = readJson(file);
  assertValid(registry, "experiment-config", data, file);
  if (!isRecord(data)) {
    throw new QualityError(QualityErrorCode.INVALID_ARTIFACT, `${file} must hold a JSON object`, { path: file });
  }
  return toExperimentConfig(data);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function toExperimentConfig(data: Record<string, unknown>): ExperimentConfig {
  const { dimension, p_true, basis } = data;
  return {
    ...data,
    dimension: typeof dimension === "number" ? dimension : undefined,
    p_true: isNumberArray(p_true) ? p_true : null,
    basis: typeof basis === "string" ? basis : undefined,
  };
}

/**
 * Whether the experiment ships a ground-truth `p_true` vector.
 *
 * Any failure while loading the config counts as "no ground truth".
 */
export function hasGroundTruth(experimentPath: string, registry?: SchemaRegistry): boolean {
  try {
    const config = loadExperimentConfig(experimentPath, registry);
    return Array.isArray(config.p_true);
  } catch (e) {
    debug("ground truth probe failed", { experimentPath, reason: e instanceof Error ? e.message : String(e) });
    return false;
  }
}

function numberOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function toDegreeSummary(entry: Record<string, unknown>, degree: number): DegreeSummary {
  const l2 =
    numberOrNull(entry["l2_approx_error"]) ?? numberOrNull(entry["l2_error"]) ?? numberOrNull(entry["l2_norm"]);
  const cp = entry["critical_points"];
  return {
    degree,
    l2_error: l2,
    critical_points: typeof cp === "number" ? cp : Array.isArray(cp) ? cp.length : null,
  };
}

/** Degree entries from any of the three summary layouts, keyed by degree. */
function collectDegreeEntries(data: unknown): Map<number, Record<string, unknown>> {
  const byDegree = new Map<number, Record<string, unknown>>();

  const fromList = (list: unknown[]): void => {
    for (const item of list) {
      if (isRecord(item) && typeof item["degree"] === "number") byDegree.set(item["degree"], item);
    }
  };

  if (Array.isArray(data)) {
    fromList(data);
  } else if (isRecord(data)) {
    const summary = data["results_summary"];
    const degreeResults = data["degree_results"];
    if (isRecord(summary)) {
      for (const [key, item] of Object.entries(summary)) {
        const m = /^degree_(\d+)$/.exec(key);
        if (m && isRecord(item)) byDegree.set(Number(m[1]), item);
      }
    } else if (Array.isArray(degreeResults)) {
      fromList(degreeResults);
    }
  }

  return byDegree;
}

/**
 * Read `results_summary.json`.
 *
 * Accepts a plain array of degree entries, `{ results_summary: { degree_N: … } }`
 * or `{ degree_results: [...] }`.
 */
export function loadResultsSummary(
  experimentPath: string,
  registry: SchemaRegistry = defaultRegistry(),
): ResultsSummary {
  const file = path.join(experimentPath, RESULTS_SUMMARY_FILE);
  if (!fs.existsSync(file)) {
    throw new QualityError(
      QualityErrorCode.EXPERIMENT_NOT_FOUND,
      `No ${RESULTS_SUMMARY_FILE} in ${experimentPath}`,
      { path: file },
    );
  }

  const data = readJson(file);
  assertValid(registry, "results-summary", data, file);

  const id = isRecord(data) && typeof data["experiment_id"] === "string" ? data["experiment_id"] : undefined;
  const degrees = [...collectDegreeEntries(data)]
    .map(([degree, entry]) => toDegreeSummary(entry, degree))
    .sort((a, b) => a.degree - b.degree);
  if (degrees.length === 0) {
    throw new QualityError(
      QualityErrorCode.INVALID_ARTIFACT,
      `${RESULTS_SUMMARY_FILE} in ${experimentPath} has no degree entries`,
      { path: file },
    );
  }

  return {
    experiment_id: id ?? path.basename(path.resolve(experimentPath)),
    degrees,
  };
}

const CSV_LAYOUTS: ReadonlyArray<{
  format: CriticalPointFormat;
  file: (degree: number) => string;
  coordinatePrefix: string;
  objectiveColumn: string;
}> = [
  { format: "raw", file: (d) => `critical_points_raw_deg_${d}.csv`, coordinatePrefix: "p", objectiveColumn: "objective" },
  { format: "legacy", file: (d) => `critical_points_deg_${d}.csv`, coordinatePrefix: "x", objectiveColumn: "z" },
];

/** Coordinate columns (`p1`, `p2`, … or `x1`, …) ordered by index. */
function coordinateColumns(header: string[], prefix: string): string[] {
  const re = new RegExp(`^${prefix}(\\d+)$`);
  return header
    .map((name) => ({ name, m: re.exec(name) }))
    .filter((c): c is { name: string; m: RegExpExecArray } => c.m !== null)
    .sort((a, b) => Number(a.m[1]) - Number(b.m[1]))
    .map((c) => c.name);
}

function parseCell(value: string | undefined, filePath: string, row: number, column: string): number {
  const n = value === undefined || value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isFinite(n)) {
    throw new QualityError(
      QualityErrorCode.INVALID_ARTIFACT,
      `${path.basename(filePath)} row ${row}: column ${column} is not a number ("${value ?? ""}")`,
      { path: filePath, row, column },
    );
  }
  return n;
}

export function parseCriticalPointsCsv(
  text: string,
  filePath: string,
  format: CriticalPointFormat,
): CriticalPointRow[] {
  const layout = CSV_LAYOUTS.find((l) => l.format === format) ?? CSV_LAYOUTS[0];
  const records: Record<string, string>[] = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (records.length === 0) return [];

  const columns = coordinateColumns(Object.keys(records[0]), layout.coordinatePrefix);
  if (columns.length === 0) {
    throw new QualityError(
      QualityErrorCode.INVALID_ARTIFACT,
      `${path.basename(filePath)} has no ${layout.coordinatePrefix}1..${layout.coordinatePrefix}N columns`,
      { path: filePath },
    );
  }

  return records.map((record, i) => {
    const objective = record[layout.objectiveColumn];
    return {
      coordinates: columns.map((c) => parseCell(record[c], filePath, i + 1, c)),
      objective:
        objective === undefined || objective === "" ? null : parseCell(objective, filePath, i + 1, layout.objectiveColumn),
    };
  });
}

/**
 * Load the critical points found for one degree.
 *
 * Prefers `critical_points_raw_deg_<d>.csv` (p1..pN, objective) over the
 * older `critical_points_deg_<d>.csv` (x1..xN, z).
 */
export function loadCriticalPointsForDegree(experimentPath: string, degree: number): CriticalPointSet {
  const tried: string[] = [];
  for (const layout of CSV_LAYOUTS) {
    const filePath = path.join(experimentPath, layout.file(degree));
    tried.push(filePath);
    if (!fs.existsSync(filePath)) continue;

    const rows = parseCriticalPointsCsv(fs.readFileSync(filePath, "utf8"), filePath, layout.format);
    debug("critical points loaded", { degree, format: layout.format, rows: rows.length });
    return { degree, format: layout.format, filePath, rows };
  }

  throw new QualityError(
    QualityErrorCode.ARTIFACT_NOT_FOUND,
    `Critical points file not found for degree ${degree}. Tried: ${tried.join(", ")}`,
    { degree, tried },
  );
}
