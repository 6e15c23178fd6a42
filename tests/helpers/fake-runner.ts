import type { DatabaseRunner } from "../../src/runners.js";
import type { Row } from "../../src/types.js";

type Step = number | Error;

/**
 * Runner replaying scripted outcomes: a duration in ms or an error to throw.
 */
export class FakeRunner implements DatabaseRunner {
  name = "fake";
  readonly executed: string[] = [];
  readonly queried: string[] = [];

  constructor(
    private readonly steps: Step[] = [],
    private readonly rowCount = 0
  ) {}

  connect(): Promise<void> {
    return Promise.resolve();
  }

  disconnect(): Promise<void> {
    return Promise.resolve();
  }

  execute(sql: string): Promise<Row[]> {
    this.executed.push(sql);
    const next = this.steps.shift();
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve([]);
  }

  runQuery(sql: string): Promise<{ durationMs: number; rowCount: number }> {
    this.queried.push(sql);
    const next = this.steps.shift() ?? 0;
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve({ durationMs: next, rowCount: this.rowCount });
  }
}
