import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { QualityError, QualityErrorCode } from "../errors.js";
import type { CampaignSummary, QualityReport } from "../types/report.js";
import { renderCampaignMarkdown, renderMarkdown } from "./render.js";

export type WrittenReportFile = {
  path: string;
  sha256: string;
  bytes: number;
};

export const CAMPAIGN_SUMMARY_FILE = "campaign_summary.json";
export const CAMPAIGN_REPORT_FILE = "campaign_report.md";

export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Writes quality reports under `<outDir>/<key>/` as quality_report.json and
 * quality_report.md, and campaign summaries directly under `outDir`.
 */
export class ReportWriter {
  constructor(private readonly outDir: string) {}

  /**
   * Report directory for `key` (the experiment id, or a relative path in a batch).
   * Every `/`-separated segment must be a plain name, so the result stays below outDir.
   */
  reportDir(key: string): string {
    const segments = key.split(/[\\/]/);
    if (segments.some((s) => s === "" || s === "." || s === "..")) {
      throw new QualityError(
        QualityErrorCode.INVALID_ARTIFACT,
        `Report directory "${key}" would leave the output directory ${this.outDir}`,
        { key },
      );
    }
    return path.join(this.outDir, ...segments);
  }

  write(report: QualityReport, key: string = report.experiment_id): WrittenReportFile[] {
    const dir = this.reportDir(key);
    fs.mkdirSync(dir, { recursive: true });

    return [
      this.writeFile(path.join(dir, "quality_report.json"), JSON.stringify(report, null, 2) + "\n"),
      this.writeFile(path.join(dir, "quality_report.md"), renderMarkdown(report)),
    ];
  }

  writeCampaign(summary: CampaignSummary): WrittenReportFile[] {
    fs.mkdirSync(this.outDir, { recursive: true });

    return [
      this.writeFile(path.join(this.outDir, CAMPAIGN_SUMMARY_FILE), JSON.stringify(summary, null, 2) + "\n"),
      this.writeFile(path.join(this.outDir, CAMPAIGN_REPORT_FILE), renderCampaignMarkdown(summary)),
    ];
  }

  private writeFile(filePath: string, content: string): WrittenReportFile {
    fs.writeFileSync(filePath, content, "utf8");
    return { path: filePath, sha256: sha256Hex(content), bytes: Buffer.byteLength(content, "utf8") };
  }
}
