import { loadQualityThresholds, resolveThresholdsPath } from "../thresholds/loader.js";
import { validateThresholds } from "../thresholds/validator.js";
import type { ThresholdsDocument } from "../types/thresholds.js";
import { failure } from "./analyze.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ThresholdsResult =
  | { ok: true; path: string; thresholds: ThresholdsDocument; exitCode: ExitCode }
  | { ok: false; path?: string; error: { code: string; message: string }; exitCode: ExitCode };

/** Load and schema-check a thresholds file. */
export function checkThresholdsFile(opts: { thresholdsPath?: string; allowOrphanKeys?: boolean }): ThresholdsResult {
  const file = resolveThresholdsPath(opts.thresholdsPath);
  try {
    const store = loadQualityThresholds(file, { allowOrphanKeys: opts.allowOrphanKeys });
    const { valid, errors } = validateThresholds(store);
    if (!valid) {
      return {
        ok: false,
        path: file,
        error: { code: "THRESHOLDS_INVALID", message: errors ?? "invalid thresholds" },
        exitCode: EXIT.INPUT_INVALID,
      };
    }
    return { ok: true, path: file, thresholds: store.toJSON(), exitCode: EXIT.SUCCESS };
  } catch (err) {
    return { ...failure(err), path: file };
  }
}
