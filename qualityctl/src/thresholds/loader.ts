import fs from "node:fs";
import path from "node:path";
import { QualityError, QualityErrorCode } from "../errors.js";
import { debug } from "../logger.js";
import { parseThresholds, type ParseOptions } from "./parser.js";
import type { ThresholdStore } from "./store.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const DEFAULT_THRESHOLDS_FILE = path.join(CONFIG_DIR, "quality-thresholds.toml");

/** Env var naming a thresholds file to use instead of the bundled one. */
export const THRESHOLDS_ENV = "QUALITYCTL_THRESHOLDS";

/**
 * Resolve which thresholds file to read: explicit path ← QUALITYCTL_THRESHOLDS ← bundled default.
 */
export function resolveThresholdsPath(configPath?: string): string {
  if (configPath) return path.resolve(configPath);
  const fromEnv = process.env[THRESHOLDS_ENV];
  if (fromEnv !== undefined && fromEnv !== "") return path.resolve(fromEnv);
  return DEFAULT_THRESHOLDS_FILE;
}

/**
 * Load quality thresholds from disk.
 *
 * A missing file is fatal; no defaults are substituted.
 */
export function loadQualityThresholds(configPath?: string, options?: ParseOptions): ThresholdStore {
  const file = resolveThresholdsPath(configPath);
  if (!fs.existsSync(file)) {
    throw new QualityError(
      QualityErrorCode.CONFIG_NOT_FOUND,
      `Quality thresholds file not found: ${file}`,
      { path: file },
    );
  }

  debug("loading thresholds", { path: file });
  const store = parseThresholds(fs.readFileSync(file, "utf8"), options);
  debug("thresholds loaded", { categories: store.names() });
  return store;
}
