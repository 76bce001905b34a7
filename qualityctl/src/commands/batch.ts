import path from "node:path";
import { discoverExperiments } from "../experiment/discovery.js";
import { warn } from "../logger.js";
import { aggregateCampaign } from "../report/campaign.js";
import { ReportWriter, type WrittenReportFile } from "../report/writer.js";
import { loadQualityThresholds } from "../thresholds/loader.js";
import type { ThresholdStore } from "../thresholds/store.js";
import type { CampaignSummary, OverallVerdict, QualityReport } from "../types/report.js";
import { analyze, failure } from "./analyze.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type BatchOptions = {
  root: string;
  filter?: string;
  thresholdsPath?: string;
  outDir?: string;
  now?: Date;
};

export type BatchEntry =
  | { key: string; experimentPath: string; ok: true; report: QualityReport }
  | { key: string; experimentPath: string; ok: false; error: { code: string; message: string } };

export type BatchResult =
  | {
      ok: true;
      entries: BatchEntry[];
      counts: Record<OverallVerdict | "error", number>;
      campaign: CampaignSummary;
      /** Campaign summary files; per-experiment reports land in `<outDir>/<key>/`. */
      files: WrittenReportFile[];
      exitCode: ExitCode;
    }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

/** Experiment path relative to the root with `/` separators; the root's own name when they coincide. */
function experimentKey(base: string, experimentPath: string): string {
  const rel = path.relative(base, experimentPath).split(path.sep).join("/");
  return rel === "" ? path.basename(base) : rel;
}

/**
 * Analyze every experiment under `root`. Thresholds are loaded once and
 * shared; a broken experiment is recorded and the batch continues.
 *
 * Reports are keyed by relative path, so equally named experiments in
 * different campaign folders keep separate report directories.
 */
export function batch(opts: BatchOptions): BatchResult {
  let store: ThresholdStore;
  try {
    store = loadQualityThresholds(opts.thresholdsPath);
  } catch (err) {
    return failure(err);
  }

  const base = path.resolve(opts.root);
  const dirs = discoverExperiments(base, { filter: opts.filter });
  if (dirs.length === 0) {
    return {
      ok: false,
      error: { code: "NO_EXPERIMENTS", message: `No experiments found under ${base}` },
      exitCode: EXIT.INPUT_INVALID,
    };
  }

  const counts: Record<OverallVerdict | "error", number> = { pass: 0, warn: 0, fail: 0, error: 0 };
  const entries: BatchEntry[] = [];

  for (const experimentPath of dirs) {
    const key = experimentKey(base, experimentPath);
    const res = analyze({ experimentPath, store, outDir: opts.outDir, reportKey: key, now: opts.now });
    if (res.ok) {
      counts[res.report.overall]++;
      entries.push({ key, experimentPath, ok: true, report: res.report });
    } else {
      counts.error++;
      warn(res.error.code, res.error.message, { experimentPath });
      entries.push({ key, experimentPath, ok: false, error: res.error });
    }
  }

  const campaign = aggregateCampaign({
    campaign: path.basename(base),
    reports: entries.flatMap((e) => (e.ok ? [{ key: e.key, report: e.report }] : [])),
    errors: entries.flatMap((e) => (e.ok ? [] : [{ key: e.key, ...e.error }])),
    now: opts.now,
  });

  let files: WrittenReportFile[] = [];
  if (opts.outDir) {
    try {
      files = new ReportWriter(opts.outDir).writeCampaign(campaign);
    } catch (err) {
      return failure(err);
    }
  }

  const exitCode = counts.error > 0 ? EXIT.INPUT_INVALID : counts.fail > 0 ? EXIT.QUALITY_FAILED : EXIT.SUCCESS;
  return { ok: true, entries, counts, campaign, files, exitCode };
}
