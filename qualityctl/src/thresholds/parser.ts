import { QualityError, QualityErrorCode } from "../errors.js";
import type { ThresholdValue } from "../types/thresholds.js";
import { ThresholdStore } from "./store.js";

export type ParseOptions = {
  /**
   * Drop `key = value` lines that appear before any `[section]` header
   * instead of rejecting them. Older threshold files rely on this.
   */
  allowOrphanKeys?: boolean;
};

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INT_RE = /^[+-]?\d+$/;

/**
 * Detect the type of a raw value.
 *
 * Values containing `.` or an `e-`/`e+` exponent are floats, everything else
 * is tried as an integer; if the chosen parse fails the text is kept.
 */
export function parseThresholdValue(raw: string): ThresholdValue {
  const lower = raw.toLowerCase();
  if (lower.includes("e-") || lower.includes("e+") || raw.includes(".")) {
    return FLOAT_RE.test(raw) ? { kind: "float", value: Number(raw) } : { kind: "text", value: raw };
  }
  return INT_RE.test(raw) ? { kind: "int", value: Number.parseInt(raw, 10) } : { kind: "text", value: raw };
}

/** Parse `[section]` / `key = value` threshold text into a store. */
export function parseThresholds(text: string, options: ParseOptions = {}): ThresholdStore {
  const categories = new Map<string, Map<string, ThresholdValue>>();
  let current: Map<string, ThresholdValue> | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "" || line.startsWith("#")) continue;

    if (line.startsWith("[") && line.endsWith("]")) {
      const name = line.slice(1, -1).trim();
      current = new Map();
      categories.set(name, current);
      continue;
    }

    const eq = line.indexOf("=");
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    const hash = value.indexOf("#");
    if (hash !== -1) value = value.slice(0, hash).trim();

    if (current === null) {
      if (options.allowOrphanKeys) continue;
      throw new QualityError(
        QualityErrorCode.CONFIG_ORPHAN_KEY,
        `Line ${i + 1}: "${key}" appears before any [section] header`,
        { line: i + 1, key },
      );
    }

    current.set(key, parseThresholdValue(value));
  }

  return new ThresholdStore(categories);
}
