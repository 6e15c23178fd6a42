import { parseArgs } from "node:util";
import { connectionFromEnv, parseInteger } from "./config.js";
import { countRows } from "./data-generator.js";
import { step } from "./errors.js";
import {
  createDerivedObjects,
  demonstrateStaleness,
  findVariant,
  MATERIALIZED_VIEW_NAME,
  QUERY_VARIANTS,
  refreshMaterializedView,
  verifyEquivalence,
  VIEW_NAME,
} from "./queries.js";
import { writeReport, type BenchmarkReport } from "./report.js";
import { benchmarkVariant, PostgresRunner } from "./runners.js";
import { TABLES } from "./schema.js";
import { inspectSpace } from "./space.js";
import { formatBytes, formatDuration } from "./utils.js";

const { values } = parseArgs({
  options: {
    warmup: { type: "string", default: "1" },
    runs: { type: "string", short: "r", default: "3" },
    query: { type: "string", short: "q" },
    verify: { type: "boolean", default: false },
    refresh: { type: "boolean", default: false },
    staleness: { type: "string" },
    report: { type: "boolean", default: false },
    "reports-dir": { type: "string", default: "reports" },
    help: { type: "boolean", short: "h", default: false },
  },
});

if (values.help) {
  console.log(`
Usage: npm run benchmark -- [options]

Options:
  --warmup <n>       Number of warmup runs, discarded (default: 1)
  -r, --runs <n>     Number of benchmark runs (default: 3)
  -q, --query <name> Run one variant only (${QUERY_VARIANTS.map((q) => q.name).join(", ")})
  --verify           Check that view and materialized view match the raw join
  --refresh          Refresh the materialized view before benchmarking and time it
  --staleness <n>    After benchmarking, append n enrollments and show the stale snapshot
  --report           Generate JSON and Markdown reports
  --reports-dir <d>  Report directory (default: reports)
  -h, --help         Show this help message

Run "npm run generate" first to create and populate the tables.

Examples:
  npm run benchmark                        # All variants
  npm run benchmark -- -q view -r 10       # Plain view only, 10 runs
  npm run benchmark -- --verify --report   # Check results and write reports
`);
  process.exit(0);
}

const WARMUP_RUNS = parseInteger("--warmup", values.warmup, 0);
const BENCHMARK_RUNS = parseInteger("--runs", values.runs, 1);

// Filter variants if specified
const queryFilter = values.query;
const selected = queryFilter ? findVariant(queryFilter) : undefined;
const variantsToRun = selected ? [selected] : QUERY_VARIANTS;

if (queryFilter && !selected) {
  console.error(`Variant "${queryFilter}" not found. Available variants:`);
  QUERY_VARIANTS.forEach((q) => {
    console.error(`  - ${q.name}: ${q.description}`);
  });
  process.exit(1);
}

async function main(): Promise<void> {
  console.log("=== View vs Materialized View Benchmarks ===");
  console.log(`Warmup: ${String(WARMUP_RUNS)} runs, Benchmark: ${String(BENCHMARK_RUNS)} runs`);
  console.log(`Variants: ${variantsToRun.map((q) => q.name).join(", ")}`);

  const runner = new PostgresRunner(connectionFromEnv());
  await runner.connect();

  try {
    const rowCounts = await step("count rows", () => countRows(runner));
    // demonstrateStaleness deletes the rows it appends, so these counts stay valid
    await step("create view and materialized view", () =>
      createDerivedObjects(runner, { withData: true })
    );

    const report: BenchmarkReport = {
      timestamp: new Date().toISOString(),
      warmupRuns: WARMUP_RUNS,
      benchmarkRuns: BENCHMARK_RUNS,
      rowCounts,
      results: [],
      space: [],
    };

    if (values.refresh) {
      report.refreshMs = await step("refresh materialized view", () =>
        refreshMaterializedView(runner)
      );
      console.log(`\nRefreshed ${MATERIALIZED_VIEW_NAME} in ${formatDuration(report.refreshMs)}`);
    }

    if (values.verify) {
      console.log("\nVerifying equivalence with the raw join...");
      report.equivalence = await step("verify equivalence", () => verifyEquivalence(runner));
      for (const e of report.equivalence) {
        if (e.error !== undefined) {
          console.log(`  ${e.variant}: not verified (${e.error})`);
          continue;
        }
        console.log(
          `  ${e.variant}: ${e.equivalent ? "identical" : `missing=${String(e.missing)}, extra=${String(e.extra)}`}`
        );
      }
    }

    for (const variant of variantsToRun) {
      console.log(`\n[${variant.name}] ${variant.description}`);
      console.log(
        `  Warmup ${String(WARMUP_RUNS)}, benchmarking ${String(BENCHMARK_RUNS)} runs...`
      );
      const result = await benchmarkVariant(runner, variant, {
        warmupRuns: WARMUP_RUNS,
        benchmarkRuns: BENCHMARK_RUNS,
      });
      report.results.push(result);

      if (result.errors.length > 0) {
        console.log(`  Errors: ${String(result.errors.length)}/${String(result.runs)}`);
        result.errors.forEach((e) => {
          console.log(`    - ${e}`);
        });
        if (result.errors.length >= result.runs) continue;
      }

      console.log(
        `  Results: rows=${result.rowsReturned.toLocaleString()}, min=${formatDuration(result.minMs)}, ` +
          `avg=${formatDuration(result.avgMs)}, p95=${formatDuration(result.p95Ms)}, max=${formatDuration(result.maxMs)}`
      );
    }

    report.space = await step("inspect space", () =>
      inspectSpace(runner, [...TABLES, VIEW_NAME, MATERIALIZED_VIEW_NAME])
    );
    console.log("\nSpace:");
    for (const s of report.space) {
      console.log(
        `  ${s.name} (${s.kind}, ${s.persistence}): data=${formatBytes(s.dataBytes)}, total=${formatBytes(s.totalBytes)}`
      );
    }

    if (values.staleness) {
      const extra = parseInteger("--staleness", values.staleness, 1);
      report.staleness = await step("staleness demonstration", () =>
        demonstrateStaleness(runner, extra)
      );
      const s = report.staleness;
      console.log(
        `\nStaleness: join ${String(s.joinRowsBefore)} → ${String(s.joinRowsAfter)} rows, ` +
          `snapshot ${String(s.snapshotRowsBeforeRefresh)} before refresh, ` +
          `${String(s.snapshotRowsAfterRefresh)} after (${formatDuration(s.refreshMs)})`
      );
    }

    if (values.report) {
      const { jsonPath, mdPath } = writeReport(report, values["reports-dir"]);
      console.log(`\nGenerated JSON report: ${jsonPath}`);
      console.log(`Generated Markdown report: ${mdPath}`);
    }
  } finally {
    await runner.disconnect();
  }

  console.log("\n=== Done ===");
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
