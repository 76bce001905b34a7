import type { L2Quality } from "../types/quality.js";
import type {
  CampaignDegreeStats,
  CampaignError,
  CampaignExperimentRow,
  CampaignSummary,
  DegreeReport,
  OverallVerdict,
  QualityReport,
} from "../types/report.js";

export type CampaignEntry = {
  /** Unique label for the experiment within the campaign (its path relative to the root). */
  key: string;
  report: QualityReport;
};

export type CampaignInput = {
  campaign: string;
  reports: readonly CampaignEntry[];
  errors?: readonly CampaignError[];
  now?: Date;
};

type DegreeBucket = {
  l2: { key: string; value: number }[];
  counts: Record<L2Quality, number>;
  recovery: { min: number; recoveries: number }[];
};

function mean(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/** Sample standard deviation; 0 below two values. */
function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1));
}

function finalGraded(report: QualityReport): DegreeReport | null {
  const withL2 = report.degrees.filter((d) => d.l2_error !== null);
  return withL2.length > 0 ? withL2[withL2.length - 1] : null;
}

function degreeStats(degree: number, bucket: DegreeBucket): CampaignDegreeStats {
  const values = bucket.l2.map((e) => e.value);
  let best = bucket.l2[0];
  let worst = bucket.l2[0];
  for (const e of bucket.l2) {
    if (e.value < best.value) best = e;
    if (e.value > worst.value) worst = e;
  }

  const mins = bucket.recovery.map((r) => r.min);
  return {
    degree,
    num_experiments: values.length,
    l2_min: Math.min(...values),
    l2_mean: mean(values),
    l2_max: Math.max(...values),
    l2_std: sampleStd(values),
    best_experiment: best.key,
    worst_experiment: worst.key,
    quality_counts: bucket.counts,
    recovery:
      mins.length > 0
        ? {
            num_experiments: mins.length,
            best_min_distance: Math.min(...mins),
            mean_min_distance: mean(mins),
            total_recoveries: bucket.recovery.reduce((acc, r) => acc + r.recoveries, 0),
          }
        : null,
  };
}

/**
 * Aggregate per-experiment quality reports into a campaign summary.
 *
 * Degrees are aligned across experiments; a degree appears once at least
 * one experiment records an L2 error for it. Ties for best or worst go to
 * the experiment listed first.
 */
export function aggregateCampaign(input: CampaignInput): CampaignSummary {
  const verdicts: Record<OverallVerdict, number> = { pass: 0, warn: 0, fail: 0 };
  const buckets = new Map<number, DegreeBucket>();
  const experiments: CampaignExperimentRow[] = [];
  let stagnant = 0;

  for (const { key, report } of input.reports) {
    verdicts[report.overall]++;
    if (report.stagnation.is_stagnant) stagnant++;

    for (const d of report.degrees) {
      let bucket = buckets.get(d.degree);
      if (!bucket) {
        bucket = { l2: [], counts: { excellent: 0, good: 0, fair: 0, poor: 0 }, recovery: [] };
        buckets.set(d.degree, bucket);
      }
      if (d.l2_error !== null) bucket.l2.push({ key, value: d.l2_error });
      if (d.l2_quality !== null) bucket.counts[d.l2_quality]++;
      if (d.recovery) bucket.recovery.push({ min: d.recovery.min_distance, recoveries: d.recovery.num_recoveries });
    }

    const last = finalGraded(report);
    experiments.push({
      key,
      experiment_id: report.experiment_id,
      overall: report.overall,
      final_degree: last?.degree ?? null,
      final_l2: last?.l2_error ?? null,
      final_quality: last?.l2_quality ?? null,
      is_stagnant: report.stagnation.is_stagnant,
    });
  }

  const degrees = [...buckets]
    .filter(([, bucket]) => bucket.l2.length > 0)
    .sort(([a], [b]) => a - b)
    .map(([degree, bucket]) => degreeStats(degree, bucket));

  const errors = [...(input.errors ?? [])];
  const n = input.reports.length;

  return {
    campaign: input.campaign,
    generated_at: (input.now ?? new Date()).toISOString(),
    num_experiments: n,
    verdicts,
    num_errors: errors.length,
    stagnant_experiments: stagnant,
    stagnant_fraction: n > 0 ? stagnant / n : 0,
    degrees,
    experiments,
    errors,
  };
}
