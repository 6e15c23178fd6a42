import postgres from "postgres";
import { DEFAULT_CONNECTION, type ConnectionConfig } from "./config.js";
import { ConfigError, NotConnectedError, errorMessage } from "./errors.js";
import { calculateStats } from "./utils.js";
import type { BenchmarkResult, QueryVariant, Row, SqlParam, VariantResult } from "./types.js";

export interface DatabaseRunner {
  name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  execute(sql: string, params?: SqlParam[]): Promise<Row[]>;
  runQuery(sql: string): Promise<{ durationMs: number; rowCount: number }>;
}

export class PostgresRunner implements DatabaseRunner {
  name = "postgres";
  private sql: postgres.Sql | null = null;

  constructor(private readonly config: ConnectionConfig = DEFAULT_CONNECTION) {}

  connect(): Promise<void> {
    this.sql = postgres({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      username: this.config.username,
      password: this.config.password,
      max: 1,
      onnotice: () => undefined,
    });
    return Promise.resolve();
  }

  async disconnect(): Promise<void> {
    if (this.sql) {
      await this.sql.end();
      this.sql = null;
    }
  }

  async execute(query: string, params: SqlParam[] = []): Promise<Row[]> {
    if (!this.sql) throw new NotConnectedError(this.name);
    const result = await this.sql.unsafe(query, params);
    return result;
  }

  async runQuery(query: string): Promise<{ durationMs: number; rowCount: number }> {
    if (!this.sql) throw new NotConnectedError(this.name);
    const start = performance.now();
    const result = await this.sql.unsafe(query);
    return { durationMs: performance.now() - start, rowCount: result.length };
  }
}

export async function runBenchmark(
  runner: DatabaseRunner,
  variant: QueryVariant,
  runs: number
): Promise<BenchmarkResult[]> {
  const results: BenchmarkResult[] = [];

  for (let i = 0; i < runs; i++) {
    try {
      const { durationMs, rowCount } = await runner.runQuery(variant.sql);
      results.push({ query: variant.name, durationMs, rowsReturned: rowCount });
    } catch (error) {
      results.push({
        query: variant.name,
        durationMs: 0,
        rowsReturned: 0,
        error: errorMessage(error),
      });
    }
  }

  return results;
}

export interface RunOptions {
  warmupRuns: number;
  benchmarkRuns: number;
}

/**
 * Warm up, then time `benchmarkRuns` executions of one variant. Warmup
 * timings are discarded; stats are computed over successful runs only.
 */
export async function benchmarkVariant(
  runner: DatabaseRunner,
  variant: QueryVariant,
  options: RunOptions
): Promise<VariantResult> {
  if (!Number.isInteger(options.benchmarkRuns) || options.benchmarkRuns < 1) {
    throw new ConfigError(`benchmarkRuns must be >= 1, got ${String(options.benchmarkRuns)}`);
  }
  if (!Number.isInteger(options.warmupRuns) || options.warmupRuns < 0) {
    throw new ConfigError(`warmupRuns must be >= 0, got ${String(options.warmupRuns)}`);
  }

  if (options.warmupRuns > 0) {
    await runBenchmark(runner, variant, options.warmupRuns);
  }
  const results = await runBenchmark(runner, variant, options.benchmarkRuns);

  const errors = results.flatMap((r) => (r.error === undefined ? [] : [r.error]));
  const ok = results.filter((r) => r.error === undefined);
  const stats = calculateStats(ok.map((r) => r.durationMs));

  return {
    variant: variant.name,
    description: variant.description,
    kind: variant.kind,
    rowsReturned: ok[0]?.rowsReturned ?? 0,
    minMs: stats.min,
    avgMs: stats.avg,
    medianMs: stats.median,
    p95Ms: stats.p95,
    maxMs: stats.max,
    runs: results.length,
    errors,
  };
}
