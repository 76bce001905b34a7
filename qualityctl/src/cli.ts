#!/usr/bin/env node

import { Command } from "commander";
import YAML from "yaml";
import { analyze } from "./commands/analyze.js";
import { batch } from "./commands/batch.js";
import { checkThresholdsFile } from "./commands/thresholds.js";
import { EXIT } from "./commands/exit-codes.js";
import { parseFormat, parsePositiveInt, parseThresholdsFormat, type ThresholdsFormat } from "./commands/options.js";
import { error, info, setLogFormat } from "./logger.js";
import { renderCampaign, renderReport } from "./report/render.js";
import type { ReportFormat } from "./types/report.js";

/** Diagnostics follow the report format: JSONL stays machine-readable, everything else is plain. */
function useFormat(format: ReportFormat): void {
  setLogFormat(format === "jsonl" ? "jsonl" : "human");
}

const program = new Command();

program
  .name("qualityctl")
  .description("Quality and convergence diagnostics for polynomial-approximation experiments")
  .version("0.1.0")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

program
  .command("analyze")
  .description("Analyze one experiment directory")
  .argument("<experiment>", "Experiment directory (holds results_summary.json)")
  .option("--thresholds <path>", "Quality thresholds file")
  .option("--dimension <n>", "Problem dimension (overrides experiment_config.json)", parsePositiveInt)
  .option("--out <dir>", "Write quality_report.json/.md under this directory")
  .option("--format <format>", "Output format: human|jsonl|yaml|markdown", parseFormat, "human")
  .action(
    (experiment: string, opts: { thresholds?: string; dimension?: number; out?: string; format: ReportFormat }) => {
      useFormat(opts.format);
      const res = analyze({
        experimentPath: experiment,
        thresholdsPath: opts.thresholds,
        dimension: opts.dimension,
        outDir: opts.out,
      });

      if (!res.ok) {
        error(res.error.code, res.error.message, { experiment });
        process.exit(res.exitCode);
      }

      process.stdout.write(renderReport(res.report, opts.format) + "\n");
      for (const f of res.files) info("REPORT_WRITTEN", f.path, { sha256: f.sha256, bytes: f.bytes });
      process.exitCode = res.exitCode;
    },
  );

program
  .command("batch")
  .description("Analyze every experiment below a results root")
  .argument("<root>", "Results root directory")
  .option("--filter <glob>", "Only experiments whose relative path matches this glob")
  .option("--thresholds <path>", "Quality thresholds file")
  .option("--out <dir>", "Write one report directory per experiment plus the campaign summary")
  .option("--format <format>", "Output format: human|jsonl|yaml|markdown", parseFormat, "human")
  .action((root: string, opts: { filter?: string; thresholds?: string; out?: string; format: ReportFormat }) => {
    useFormat(opts.format);
    const res = batch({ root, filter: opts.filter, thresholdsPath: opts.thresholds, outDir: opts.out });

    if (!res.ok) {
      error(res.error.code, res.error.message, { root });
      process.exit(res.exitCode);
    }

    const documents = res.entries.flatMap((entry) => (entry.ok ? [renderReport(entry.report, opts.format)] : []));
    documents.push(renderCampaign(res.campaign, opts.format));
    // One YAML stream, one document per report.
    process.stdout.write(documents.join(opts.format === "yaml" ? "\n---\n" : "\n") + "\n");
    for (const f of res.files) info("REPORT_WRITTEN", f.path, { sha256: f.sha256, bytes: f.bytes });
    const { pass, warn, fail, error: failed } = res.counts;
    info("BATCH_DONE", `${res.entries.length} experiments: ${pass} pass, ${warn} warn, ${fail} fail, ${failed} error`);
    process.exitCode = res.exitCode;
  });

program
  .command("thresholds")
  .description("Validate and print the quality thresholds in effect")
  .option("--thresholds <path>", "Quality thresholds file")
  .option("--allow-orphan-keys", "Ignore key = value lines before the first [section]")
  .option("--format <format>", "Output format: human|jsonl|yaml", parseThresholdsFormat, "human")
  .action((opts: { thresholds?: string; allowOrphanKeys?: boolean; format: ThresholdsFormat }) => {
    useFormat(opts.format);
    const res = checkThresholdsFile({ thresholdsPath: opts.thresholds, allowOrphanKeys: opts.allowOrphanKeys });

    if (!res.ok) {
      error(res.error.code, res.error.message, res.path ? { path: res.path } : undefined);
      process.exit(res.exitCode);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ path: res.path, thresholds: res.thresholds }) + "\n");
    } else if (opts.format === "yaml") {
      process.stdout.write(YAML.stringify(res.thresholds));
    } else {
      console.log(`# ${res.path}`);
      for (const [category, entries] of Object.entries(res.thresholds)) {
        console.log(`[${category}]`);
        for (const [key, value] of Object.entries(entries)) console.log(`${key} = ${value}`);
      }
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INPUT_INVALID);
});
