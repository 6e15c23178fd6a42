import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { StalenessResult } from "./queries.js";
import type {
  EquivalenceResult,
  RowCounts,
  SpaceEntry,
  VariantResult,
} from "./types.js";
import { formatBytes, formatDuration } from "./utils.js";

export interface BenchmarkReport {
  timestamp: string;
  warmupRuns: number;
  benchmarkRuns: number;
  rowCounts: RowCounts;
  results: VariantResult[];
  equivalence?: EquivalenceResult[];
  refreshMs?: number;
  staleness?: StalenessResult;
  space: SpaceEntry[];
}

/**
 * How many times faster `value` is than `baseline`, e.g. "12.5x".
 */
export function speedup(baseline: number | undefined, value: number | undefined): string {
  if (baseline === undefined || value === undefined || value <= 0) return "-";
  return `${(baseline / value).toFixed(1)}x`;
}

export function generateMarkdown(report: BenchmarkReport): string {
  const lines: string[] = [
    "# Benchmark Report",
    "",
    `**Date:** ${report.timestamp}`,
    `**Warmup Runs:** ${String(report.warmupRuns)}`,
    `**Benchmark Runs:** ${String(report.benchmarkRuns)}`,
    "",
    "## Data",
    "",
    "| Table | Rows |",
    "|-------|-----:|",
  ];

  for (const [table, count] of Object.entries(report.rowCounts)) {
    lines.push(`| ${table} | ${count.toLocaleString("en-US")} |`);
  }

  const baseline = report.results.find((r) => r.kind === "join" && r.errors.length < r.runs);

  lines.push("");
  lines.push("## Results");
  lines.push("");
  if (report.benchmarkRuns < 20) {
    lines.push("_P95 equals Max with fewer than 20 benchmark runs._");
    lines.push("");
  }
  lines.push("| Variant | Rows | Min | Avg | P95 | Max | Failed | vs raw join |");
  lines.push("|---------|-----:|----:|----:|----:|----:|-------:|------------:|");
  for (const r of report.results) {
    const failed = `${String(r.errors.length)}/${String(r.runs)}`;
    if (r.errors.length >= r.runs) {
      lines.push(`| ${r.variant} | - | - | - | - | - | ${failed} | error: ${r.errors[0] ?? ""} |`);
      continue;
    }
    lines.push(
      `| ${r.variant} | ${r.rowsReturned.toLocaleString("en-US")} | ${formatDuration(r.minMs)} | ${formatDuration(r.avgMs)} | ${formatDuration(r.p95Ms)} | ${formatDuration(r.maxMs)} | ${failed} | ${speedup(baseline?.avgMs, r.avgMs)} |`
    );
  }

  const failures = report.results.filter((r) => r.errors.length > 0 && r.errors.length < r.runs);
  if (failures.length > 0) {
    lines.push("");
    for (const r of failures) {
      lines.push(`- ${r.variant}: ${r.errors[0] ?? ""}`);
    }
  }

  if (report.refreshMs !== undefined) {
    lines.push("");
    lines.push(`**Materialized view refresh:** ${formatDuration(report.refreshMs)}`);
  }

  if (report.equivalence) {
    lines.push("");
    lines.push("## Equivalence");
    lines.push("");
    lines.push("| Variant | Missing | Extra | Equivalent |");
    lines.push("|---------|--------:|------:|:----------:|");
    for (const e of report.equivalence) {
      if (e.error !== undefined) {
        lines.push(`| ${e.variant} | - | - | error: ${e.error} |`);
        continue;
      }
      lines.push(
        `| ${e.variant} | ${String(e.missing)} | ${String(e.extra)} | ${e.equivalent ? "yes" : "no"} |`
      );
    }
  }

  if (report.staleness) {
    const s = report.staleness;
    lines.push("");
    lines.push("## Staleness");
    lines.push("");
    lines.push(`- Join rows: ${String(s.joinRowsBefore)} → ${String(s.joinRowsAfter)}`);
    lines.push(`- Snapshot rows before refresh: ${String(s.snapshotRowsBeforeRefresh)}`);
    lines.push(`- Snapshot rows after refresh: ${String(s.snapshotRowsAfterRefresh)}`);
    lines.push(`- Refresh: ${formatDuration(s.refreshMs)}`);
  }

  lines.push("");
  lines.push("## Space");
  lines.push("");
  lines.push("| Object | Type | Persistence | Data | Total |");
  lines.push("|--------|------|-------------|-----:|------:|");
  for (const s of report.space) {
    lines.push(
      `| ${s.name} | ${s.kind} | ${s.persistence} | ${formatBytes(s.dataBytes)} | ${formatBytes(s.totalBytes)} |`
    );
  }
  lines.push("");

  return lines.join("\n");
}

/**
 * Write `benchmark-<timestamp>.json` and `.md` into `reportsDir`.
 */
export function writeReport(
  report: BenchmarkReport,
  reportsDir = "reports"
): { jsonPath: string; mdPath: string } {
  mkdirSync(reportsDir, { recursive: true });

  const timestamp = report.timestamp.replace(/[:.]/g, "-").slice(0, 19);

  const jsonPath = join(reportsDir, `benchmark-${timestamp}.json`);
  writeFileSync(jsonPath, JSON.stringify(report, null, 2));

  const mdPath = join(reportsDir, `benchmark-${timestamp}.md`);
  writeFileSync(mdPath, generateMarkdown(report));

  return { jsonPath, mdPath };
}
