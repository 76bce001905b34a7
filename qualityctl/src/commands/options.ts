import { InvalidArgumentError } from "commander";
import type { ReportFormat } from "../types/report.js";

// CLI option parsers; each throws InvalidArgumentError so commander reports a usage error.

export const REPORT_FORMATS: readonly ReportFormat[] = ["human", "jsonl", "yaml", "markdown"];

export function parseFormat(value: string): ReportFormat {
  const match = REPORT_FORMATS.find((f) => f === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${REPORT_FORMATS.join(", ")}`);
  }
  return match;
}

export const THRESHOLDS_FORMATS = ["human", "jsonl", "yaml"] as const;
export type ThresholdsFormat = (typeof THRESHOLDS_FORMATS)[number];

export function parseThresholdsFormat(value: string): ThresholdsFormat {
  const match = THRESHOLDS_FORMATS.find((f) => f === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${THRESHOLDS_FORMATS.join(", ")}`);
  }
  return match;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer");
  }
  return n;
}
