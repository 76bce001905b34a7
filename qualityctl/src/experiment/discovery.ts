import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { RESULTS_SUMMARY_FILE } from "./loader.js";

export type DiscoverOptions = {
  /** Glob matched against the directory path relative to the root (e.g. "lv4d_*"). */
  filter?: string;
  /** How many directory levels below the root to search. */
  maxDepth?: number;
};

/**
 * Find experiment directories (those holding results_summary.json) below `root`.
 * Returns absolute paths sorted by their relative path.
 */
export function discoverExperiments(root: string, opts: DiscoverOptions = {}): string[] {
  const base = path.resolve(root);
  if (!fs.existsSync(base)) return [];

  const maxDepth = opts.maxDepth ?? 3;
  const found: string[] = [];

  const walk = (dir: string, depth: number): void => {
    if (fs.existsSync(path.join(dir, RESULTS_SUMMARY_FILE))) {
      const rel = path.relative(base, dir).split(path.sep).join("/");
      if (!opts.filter || minimatch(rel === "" ? "." : rel, opts.filter)) found.push(dir);
    }
    if (depth >= maxDepth) return;

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isDirectory() && !entry.name.startsWith(".")) {
        walk(path.join(dir, entry.name), depth + 1);
      }
    }
  };

  walk(base, 0);
  return found.sort((a, b) => path.relative(base, a).localeCompare(path.relative(base, b)));
}
