import { errorMessage } from "./errors.js";
import type { DatabaseRunner } from "./runners.js";
import type { EquivalenceResult, QueryVariant } from "./types.js";
import { toNumber } from "./utils.js";

export const VIEW_NAME = "enrollment_details_view";
export const MATERIALIZED_VIEW_NAME = "enrollment_details_mv";

/**
 * Four-way join: every enrollment with its student and the course of its class.
 */
export const JOIN_QUERY = `SELECT
  e.id AS enrollment_id,
  s.id AS student_id,
  s.first_name,
  s.last_name,
  s.gender,
  cl.id AS class_id,
  co.name AS course_name,
  co.credits
FROM enrollment e
JOIN class cl ON cl.id = e.class_id
JOIN course co ON co.id = cl.course_id
JOIN student s ON s.id = e.student_id`;

export function createViewStatement(): string {
  return `CREATE OR REPLACE VIEW ${VIEW_NAME} AS\n${JOIN_QUERY}`;
}

export function createMaterializedViewStatement(options: { withData: boolean }): string {
  return (
    `CREATE MATERIALIZED VIEW IF NOT EXISTS ${MATERIALIZED_VIEW_NAME} AS\n${JOIN_QUERY}\n` +
    (options.withData ? "WITH DATA" : "WITH NO DATA")
  );
}

export function refreshMaterializedViewStatement(): string {
  return `REFRESH MATERIALIZED VIEW ${MATERIALIZED_VIEW_NAME}`;
}

/**
 * Three ways of reading the same result set.
 */
export const QUERY_VARIANTS: QueryVariant[] = [
  {
    name: "raw-join",
    description: "Four-way join against the base tables",
    kind: "join",
    sql: JOIN_QUERY,
  },
  {
    name: "view",
    description: "Plain view, re-runs the join on every read",
    kind: "view",
    sql: `SELECT * FROM ${VIEW_NAME}`,
  },
  {
    name: "materialized-view",
    description: "Materialized view, reads the stored snapshot",
    kind: "materialized-view",
    sql: `SELECT * FROM ${MATERIALIZED_VIEW_NAME}`,
  },
];

export function findVariant(name: string): QueryVariant | undefined {
  return QUERY_VARIANTS.find((v) => v.name === name);
}

export async function createDerivedObjects(
  runner: DatabaseRunner,
  options: { withData: boolean } = { withData: true }
): Promise<void> {
  await runner.execute(createViewStatement());
  await runner.execute(createMaterializedViewStatement(options));
}

/**
 * Refresh the snapshot and return the elapsed wall-clock time in ms.
 */
export async function refreshMaterializedView(runner: DatabaseRunner): Promise<number> {
  const start = performance.now();
  await runner.execute(refreshMaterializedViewStatement());
  return performance.now() - start;
}

async function countQuery(runner: DatabaseRunner, sql: string): Promise<number> {
  const rows = await runner.execute(`SELECT COUNT(*)::int AS count FROM (${sql}) q`);
  return toNumber(rows[0]?.count ?? 0);
}

/**
 * Compare the view and materialized-view result sets with the raw join as
 * multisets. `missing` rows are in the join only, `extra` rows in the variant only.
 * A variant that cannot be read (e.g. an unpopulated materialized view) is
 * reported with `error` and counts of zero.
 */
export async function verifyEquivalence(runner: DatabaseRunner): Promise<EquivalenceResult[]> {
  const results: EquivalenceResult[] = [];
  for (const variant of QUERY_VARIANTS) {
    if (variant.kind === "join") continue;
    try {
      const missing = await countQuery(runner, `(${JOIN_QUERY}) EXCEPT ALL (${variant.sql})`);
      const extra = await countQuery(runner, `(${variant.sql}) EXCEPT ALL (${JOIN_QUERY})`);
      results.push({ variant: variant.name, missing, extra, equivalent: missing === 0 && extra === 0 });
    } catch (error) {
      results.push({
        variant: variant.name,
        missing: 0,
        extra: 0,
        equivalent: false,
        error: errorMessage(error),
      });
    }
  }
  return results;
}

export interface StalenessResult {
  joinRowsBefore: number;
  joinRowsAfter: number;
  snapshotRowsBeforeRefresh: number;
  snapshotRowsAfterRefresh: number;
  refreshMs: number;
}

/**
 * Append enrollments spread over the existing classes and students, then show
 * that the materialized view only sees them after a refresh. The appended rows
 * are deleted and the snapshot refreshed again before returning, so the data
 * set is left as it was.
 */
export async function demonstrateStaleness(
  runner: DatabaseRunner,
  extraEnrollments: number
): Promise<StalenessResult> {
  const joinRowsBefore = await countQuery(runner, JOIN_QUERY);
  const maxRows = await runner.execute(
    "SELECT COALESCE(MAX(id), 0)::int AS max_id FROM enrollment"
  );
  const lastId = toNumber(maxRows[0]?.max_id ?? 0);

  await runner.execute(
    `INSERT INTO enrollment (class_id, student_id)
SELECT 1 + floor(random() * (SELECT MAX(id) FROM class))::int,
  1 + floor(random() * (SELECT MAX(id) FROM student))::int
FROM generate_series(1, ${String(extraEnrollments)})`
  );

  try {
    const joinRowsAfter = await countQuery(runner, JOIN_QUERY);
    const snapshotRowsBeforeRefresh = await countQuery(runner, `SELECT * FROM ${MATERIALIZED_VIEW_NAME}`);
    const refreshMs = await refreshMaterializedView(runner);
    const snapshotRowsAfterRefresh = await countQuery(runner, `SELECT * FROM ${MATERIALIZED_VIEW_NAME}`);

    return {
      joinRowsBefore,
      joinRowsAfter,
      snapshotRowsBeforeRefresh,
      snapshotRowsAfterRefresh,
      refreshMs,
    };
  } finally {
    await runner.execute(`DELETE FROM enrollment WHERE id > ${String(lastId)}`);
    await refreshMaterializedView(runner);
  }
}
