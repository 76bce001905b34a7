import YAML from "yaml";
import type { CampaignSummary, QualityReport, ReportFormat } from "../types/report.js";

function sci(value: number | null): string {
  return value === null ? "n/a" : value.toExponential(2);
}

function fixed(value: number, digits = 4): string {
  return Number.isFinite(value) ? value.toFixed(digits) : String(value);
}

function stagnationLine(report: QualityReport): string {
  const s = report.stagnation;
  if (s.is_stagnant) {
    return `stagnant since degree ${s.stagnation_start_degree ?? "?"} (${s.stagnant_count} steps)`;
  }
  return s.stagnant_count > 0
    ? `not stagnant (${s.stagnant_count} slow steps since degree ${s.stagnation_start_degree ?? "?"})`
    : "not stagnant";
}

export function renderHuman(report: QualityReport): string {
  const lines: string[] = [];
  lines.push(`Experiment ${report.experiment_id}: ${report.overall.toUpperCase()}`);
  lines.push(`  dimension: ${report.dimension ?? "unknown"}  ground truth: ${report.has_ground_truth ? "yes" : "no"}`);
  for (const d of report.degrees) {
    const parts = [`deg ${d.degree}`, `L2 ${sci(d.l2_error)}`, d.l2_quality ?? "ungraded"];
    if (d.num_critical_points !== null) parts.push(`${d.num_critical_points} pts`);
    if (d.recovery) parts.push(`min dist ${fixed(d.recovery.min_distance)} (${d.recovery.num_recoveries} recovered)`);
    if (d.objective_distribution) parts.push(`objectives ${d.objective_distribution.quality}`);
    lines.push(`  ${parts.join("  ")}`);
  }
  lines.push(`  convergence: ${stagnationLine(report)}`);
  for (const w of report.warnings) lines.push(`  warning: ${w}`);
  return lines.join("\n");
}

/** One record per degree, then a summary record. */
export function renderJsonl(report: QualityReport): string {
  const records: unknown[] = report.degrees.map((d) => ({
    type: "degree",
    experiment_id: report.experiment_id,
    ...d,
  }));
  records.push({
    type: "summary",
    experiment_id: report.experiment_id,
    dimension: report.dimension,
    has_ground_truth: report.has_ground_truth,
    overall: report.overall,
    stagnation: report.stagnation,
    warnings: report.warnings,
  });
  return records.map((r) => JSON.stringify(r)).join("\n");
}

export function renderMarkdown(report: QualityReport): string {
  const lines: string[] = [
    `# Quality report: ${report.experiment_id}`,
    "",
    `- **Overall**: ${report.overall}`,
    `- **Dimension**: ${report.dimension ?? "unknown"}`,
    `- **Ground truth**: ${report.has_ground_truth ? "yes" : "no"}`,
    `- **Generated**: ${report.generated_at}`,
    "",
    "## Degrees",
    "",
    "| Degree | L2 | Quality | Points | Min distance | Recoveries | Objectives |",
    "|---|---|---|---|---|---|---|",
  ];

  for (const d of report.degrees) {
    lines.push(
      `| ${d.degree} | ${sci(d.l2_error)} | ${d.l2_quality ?? "-"} | ${d.num_critical_points ?? "-"} | ` +
        `${d.recovery ? fixed(d.recovery.min_distance) : "-"} | ${d.recovery?.num_recoveries ?? "-"} | ` +
        `${d.objective_distribution?.quality ?? "-"} |`,
    );
  }

  lines.push("", "## Convergence", "", `- ${stagnationLine(report)}`);
  const factors = report.stagnation.improvement_factors;
  if (factors.length > 0) {
    lines.push(`- Improvement factors: ${factors.map((f) => fixed(f, 3)).join(", ")}`);
  }

  if (report.warnings.length > 0) {
    lines.push("", "## Warnings", "");
    for (const w of report.warnings) lines.push(`- ${w}`);
  }

  return lines.join("\n") + "\n";
}

export function renderReport(report: QualityReport, format: ReportFormat): string {
  switch (format) {
    case "human":
      return renderHuman(report);
    case "jsonl":
      return renderJsonl(report);
    case "yaml":
      return YAML.stringify(report).trimEnd();
    case "markdown":
      return renderMarkdown(report).trimEnd();
  }
}

function percent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function verdictCounts(summary: CampaignSummary): string {
  const { pass, warn, fail } = summary.verdicts;
  return `pass ${pass}, warn ${warn}, fail ${fail}, error ${summary.num_errors}`;
}

export function renderCampaignHuman(summary: CampaignSummary): string {
  const lines = [
    `Campaign ${summary.campaign}: ${summary.num_experiments} experiments (${verdictCounts(summary)})`,
    `  stagnant: ${summary.stagnant_experiments}/${summary.num_experiments}`,
  ];
  for (const d of summary.degrees) {
    lines.push(
      `  deg ${d.degree}  n=${d.num_experiments}  L2 min ${sci(d.l2_min)}  mean ${sci(d.l2_mean)}  max ${sci(d.l2_max)}  best ${d.best_experiment}`,
    );
  }
  for (const e of summary.errors) lines.push(`  error: ${e.key}: ${e.code} ${e.message}`);
  return lines.join("\n");
}

export function renderCampaignMarkdown(summary: CampaignSummary): string {
  const lines: string[] = [
    `# Campaign report: ${summary.campaign}`,
    "",
    `- **Experiments**: ${summary.num_experiments} (${verdictCounts(summary)})`,
    `- **Stagnant**: ${summary.stagnant_experiments} of ${summary.num_experiments} (${percent(summary.stagnant_fraction)})`,
    `- **Generated**: ${summary.generated_at}`,
    "",
    "## L2 error by degree",
    "",
    "| Degree | Experiments | Min | Mean | Max | Std | Best | Worst | Excellent | Good | Fair | Poor |",
    "|---|---|---|---|---|---|---|---|---|---|---|---|",
  ];
  for (const d of summary.degrees) {
    const c = d.quality_counts;
    lines.push(
      `| ${d.degree} | ${d.num_experiments} | ${sci(d.l2_min)} | ${sci(d.l2_mean)} | ${sci(d.l2_max)} | ${sci(d.l2_std)} | ` +
        `${d.best_experiment} | ${d.worst_experiment} | ${c.excellent} | ${c.good} | ${c.fair} | ${c.poor} |`,
    );
  }

  if (summary.degrees.some((d) => d.recovery !== null)) {
    lines.push(
      "",
      "## Parameter recovery by degree",
      "",
      "| Degree | Experiments | Best min distance | Mean min distance | Recoveries |",
      "|---|---|---|---|---|",
    );
    for (const d of summary.degrees) {
      const r = d.recovery;
      if (!r) continue;
      lines.push(
        `| ${d.degree} | ${r.num_experiments} | ${fixed(r.best_min_distance)} | ${fixed(r.mean_min_distance)} | ${r.total_recoveries} |`,
      );
    }
  }

  lines.push(
    "",
    "## Experiments",
    "",
    "| Experiment | Verdict | Final degree | Final L2 | Quality | Stagnant |",
    "|---|---|---|---|---|---|",
  );
  for (const e of summary.experiments) {
    lines.push(
      `| ${e.key} | ${e.overall} | ${e.final_degree ?? "-"} | ${e.final_l2 === null ? "-" : sci(e.final_l2)} | ` +
        `${e.final_quality ?? "-"} | ${e.is_stagnant ? "yes" : "no"} |`,
    );
  }

  if (summary.errors.length > 0) {
    lines.push("", "## Errors", "");
    for (const e of summary.errors) lines.push(`- \`${e.key}\`: ${e.code} ${e.message}`);
  }

  return lines.join("\n") + "\n";
}

export function renderCampaign(summary: CampaignSummary, format: ReportFormat): string {
  switch (format) {
    case "human":
      return renderCampaignHuman(summary);
    case "jsonl":
      return JSON.stringify({ type: "campaign", ...summary });
    case "yaml":
      return YAML.stringify(summary).trimEnd();
    case "markdown":
      return renderCampaignMarkdown(summary).trimEnd();
  }
}
