import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { generateMarkdown, speedup, writeReport, type BenchmarkReport } from "../src/report.js";

function makeReport(): BenchmarkReport {
  return {
    timestamp: "2026-01-02T03:04:05.678Z",
    warmupRuns: 1,
    benchmarkRuns: 3,
    rowCounts: { student: 10, course: 2, class: 3, enrollment: 1500 },
    results: [
      {
        variant: "raw-join",
        description: "Join",
        kind: "join",
        rowsReturned: 1500,
        minMs: 90,
        avgMs: 100,
        medianMs: 100,
        p95Ms: 110,
        maxMs: 120,
        runs: 3,
        errors: [],
      },
      {
        variant: "view",
        description: "View",
        kind: "view",
        rowsReturned: 0,
        minMs: 0,
        avgMs: 0,
        medianMs: 0,
        p95Ms: 0,
        maxMs: 0,
        runs: 3,
        errors: ["boom", "boom", "boom"],
      },
      {
        variant: "materialized-view",
        description: "Materialized view",
        kind: "materialized-view",
        rowsReturned: 1500,
        minMs: 7,
        avgMs: 8,
        medianMs: 8,
        p95Ms: 9,
        maxMs: 9.5,
        runs: 3,
        errors: [],
      },
    ],
    equivalence: [
      { variant: "view", missing: 0, extra: 1, equivalent: false },
      {
        variant: "materialized-view",
        missing: 0,
        extra: 0,
        equivalent: false,
        error: 'materialized view "enrollment_details_mv" has not been populated',
      },
    ],
    refreshMs: 1500,
    space: [
      {
        name: "enrollment_details_mv",
        kind: "materialized view",
        persistence: "permanent",
        dataBytes: 16_384,
        totalBytes: 24_576,
        populated: true,
      },
    ],
  };
}

describe("speedup", () => {
  it("divides the baseline by the value", () => {
    expect(speedup(100, 8)).toBe("12.5x");
  });

  it("returns a dash when it cannot be computed", () => {
    expect(speedup(undefined, 5)).toBe("-");
    expect(speedup(100, 0)).toBe("-");
  });
});

describe("generateMarkdown", () => {
  const lines = generateMarkdown(makeReport()).split("\n");

  it("lists row counts per table", () => {
    expect(lines).toContain("| enrollment | 1,500 |");
  });

  it("compares every variant with the raw join", () => {
    expect(lines).toContain("| raw-join | 1,500 | 90ms | 100ms | 110ms | 120ms | 0/3 | 1.0x |");
    expect(lines).toContain(
      "| materialized-view | 1,500 | 7.00ms | 8.00ms | 9.00ms | 9.50ms | 0/3 | 12.5x |"
    );
  });

  it("shows the first error of a variant whose runs all failed", () => {
    expect(lines).toContain("| view | - | - | - | - | - | 3/3 | error: boom |");
  });

  it("keeps the stats of a partially failed variant", () => {
    const report = makeReport();
    report.benchmarkRuns = 4;
    report.results[1] = {
      variant: "view",
      description: "View",
      kind: "view",
      rowsReturned: 200,
      minMs: 5,
      avgMs: 7,
      medianMs: 7,
      p95Ms: 9,
      maxMs: 9,
      runs: 4,
      errors: ["timeout"],
    };
    const partial = generateMarkdown(report).split("\n");
    expect(partial).toContain("| view | 200 | 5.00ms | 7.00ms | 9.00ms | 9.00ms | 1/4 | 14.3x |");
    expect(partial).toContain("- view: timeout");
  });

  it("notes that P95 is the maximum for few runs", () => {
    expect(lines).toContain("_P95 equals Max with fewer than 20 benchmark runs._");
    const many = makeReport();
    many.benchmarkRuns = 20;
    expect(generateMarkdown(many)).not.toContain("_P95 equals Max");
  });

  it("reports variants that could not be verified", () => {
    expect(lines).toContain(
      '| materialized-view | - | - | error: materialized view "enrollment_details_mv" has not been populated |'
    );
  });

  it("includes refresh, equivalence and space sections", () => {
    expect(lines).toContain("**Materialized view refresh:** 1.50s");
    expect(lines).toContain("| view | 0 | 1 | no |");
    expect(lines).toContain("| enrollment_details_mv | materialized view | permanent | 16 kB | 24 kB |");
  });

  it("omits the staleness section when not measured", () => {
    expect(lines).not.toContain("## Staleness");
  });
});

describe("writeReport", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it("writes JSON and Markdown named after the timestamp", () => {
    dir = mkdtempSync(join(tmpdir(), "matview-report-"));
    const report = makeReport();
    const { jsonPath, mdPath } = writeReport(report, join(dir, "reports"));

    expect(jsonPath).toBe(join(dir, "reports", "benchmark-2026-01-02T03-04-05.json"));
    expect(mdPath).toBe(join(dir, "reports", "benchmark-2026-01-02T03-04-05.md"));
    expect(JSON.parse(readFileSync(jsonPath, "utf8"))).toEqual(report);
    expect(readFileSync(mdPath, "utf8")).toBe(generateMarkdown(report));
  });
});
