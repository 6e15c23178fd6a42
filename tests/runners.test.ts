import { describe, expect, it } from "vitest";
import { ConfigError, NotConnectedError } from "../src/errors.js";
import { benchmarkVariant, PostgresRunner, runBenchmark } from "../src/runners.js";
import type { QueryVariant } from "../src/types.js";
import { FakeRunner } from "./helpers/fake-runner.js";

const variant: QueryVariant = {
  name: "view",
  description: "Plain view",
  kind: "view",
  sql: "SELECT * FROM enrollment_details_view",
};

describe("runBenchmark", () => {
  it("runs the variant sequentially and records each run", async () => {
    const runner = new FakeRunner([12, 10], 3);
    expect(await runBenchmark(runner, variant, 2)).toEqual([
      { query: "view", durationMs: 12, rowsReturned: 3 },
      { query: "view", durationMs: 10, rowsReturned: 3 },
    ]);
    expect(runner.queried).toEqual([variant.sql, variant.sql]);
  });

  it("records errors instead of throwing", async () => {
    const runner = new FakeRunner([new Error("relation does not exist")]);
    expect(await runBenchmark(runner, variant, 1)).toEqual([
      { query: "view", durationMs: 0, rowsReturned: 0, error: "relation does not exist" },
    ]);
  });
});

describe("benchmarkVariant", () => {
  it("discards warmup runs", async () => {
    const runner = new FakeRunner([100, 100, 5, 3, 4], 200);
    const result = await benchmarkVariant(runner, variant, { warmupRuns: 2, benchmarkRuns: 3 });
    expect(runner.queried).toHaveLength(5);
    expect(result).toEqual({
      variant: "view",
      description: "Plain view",
      kind: "view",
      rowsReturned: 200,
      minMs: 3,
      avgMs: 4,
      medianMs: 4,
      p95Ms: 5,
      maxMs: 5,
      runs: 3,
      errors: [],
    });
  });

  it("keeps stats of the successful runs when some fail", async () => {
    const runner = new FakeRunner([5, new Error("timeout"), 7, 9], 200);
    const result = await benchmarkVariant(runner, variant, { warmupRuns: 0, benchmarkRuns: 4 });
    expect(result).toMatchObject({
      rowsReturned: 200,
      minMs: 5,
      avgMs: 7,
      maxMs: 9,
      runs: 4,
      errors: ["timeout"],
    });
  });

  it("ignores failures in warmup but reports them in measured runs", async () => {
    const runner = new FakeRunner([new Error("cold"), 8, new Error("timeout"), 6], 1);
    const result = await benchmarkVariant(runner, variant, { warmupRuns: 1, benchmarkRuns: 3 });
    expect(result.errors).toEqual(["timeout"]);
    expect(result.minMs).toBe(6);
    expect(result.maxMs).toBe(8);
    expect(result.avgMs).toBe(7);
  });

  it("validates run counts", async () => {
    const runner = new FakeRunner();
    await expect(
      benchmarkVariant(runner, variant, { warmupRuns: 0, benchmarkRuns: 0 })
    ).rejects.toThrow(ConfigError);
    await expect(
      benchmarkVariant(runner, variant, { warmupRuns: -1, benchmarkRuns: 1 })
    ).rejects.toThrow("warmupRuns must be >= 0, got -1");
    expect(runner.queried).toHaveLength(0);
  });
});

describe("PostgresRunner", () => {
  it("refuses to query before connecting", async () => {
    const runner = new PostgresRunner();
    await expect(runner.execute("SELECT 1")).rejects.toThrow(NotConnectedError);
    await expect(runner.runQuery("SELECT 1")).rejects.toThrow("Not connected (postgres)");
  });

  it("disconnects cleanly when never connected", async () => {
    await expect(new PostgresRunner().disconnect()).resolves.toBeUndefined();
  });
});
