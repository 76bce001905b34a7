import { QualityError, errorMessage } from "../errors.js";
import { loadQualityThresholds } from "../thresholds/loader.js";
import type { ThresholdStore } from "../thresholds/store.js";
import { buildQualityReport } from "../report/quality-report.js";
import { ReportWriter, type WrittenReportFile } from "../report/writer.js";
import type { QualityReport } from "../types/report.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type AnalyzeOptions = {
  experimentPath: string;
  thresholdsPath?: string;
  /** Already-loaded thresholds; takes precedence over `thresholdsPath`. */
  store?: ThresholdStore;
  dimension?: number;
  outDir?: string;
  /** Report directory below `outDir`; defaults to the experiment id. */
  reportKey?: string;
  now?: Date;
};

export type AnalyzeResult =
  | { ok: true; report: QualityReport; files: WrittenReportFile[]; exitCode: ExitCode }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

export function failure(err: unknown): { ok: false; error: { code: string; message: string }; exitCode: ExitCode } {
  const code = err instanceof QualityError ? err.code : "UNEXPECTED";
  return { ok: false, error: { code, message: errorMessage(err) }, exitCode: EXIT.INPUT_INVALID };
}

/** Analyze one experiment directory and optionally write report files. */
export function analyze(opts: AnalyzeOptions): AnalyzeResult {
  try {
    const store = opts.store ?? loadQualityThresholds(opts.thresholdsPath);
    const report = buildQualityReport({
      experimentPath: opts.experimentPath,
      store,
      dimension: opts.dimension,
      now: opts.now,
    });
    const files = opts.outDir ? new ReportWriter(opts.outDir).write(report, opts.reportKey) : [];
    return {
      ok: true,
      report,
      files,
      exitCode: report.overall === "fail" ? EXIT.QUALITY_FAILED : EXIT.SUCCESS,
    };
  } catch (err) {
    return failure(err);
  }
}
