import { ConfigError } from "./errors.js";
import type { DatabaseRunner } from "./runners.js";
import { GENDERS, MAX_CREDITS, MIN_CREDITS, TABLES } from "./schema.js";
import type { RowCounts, ScaleConfig, TableName } from "./types.js";
import { toNumber } from "./utils.js";

export const DEFAULT_SCALE: ScaleConfig = {
  students: 100_000,
  courses: 1_000,
  classes: 5_000,
  enrollments: 1_000_000,
  batchSize: 100_000,
};

const COUNT_KEYS: Record<TableName, keyof Omit<ScaleConfig, "batchSize">> = {
  student: "students",
  course: "courses",
  class: "classes",
  enrollment: "enrollments",
};

export function requestedRows(scale: ScaleConfig, table: TableName): number {
  return scale[COUNT_KEYS[table]];
}

/**
 * DEFAULT_SCALE with every row count multiplied by `factor` (at least one row
 * per table). Batch size is left unchanged.
 */
export function scaleCounts(factor: number, base: ScaleConfig = DEFAULT_SCALE): ScaleConfig {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new ConfigError(`Scale factor must be positive, got ${String(factor)}`);
  }
  const scaled = (n: number): number => Math.max(1, Math.round(n * factor));
  return {
    students: scaled(base.students),
    courses: scaled(base.courses),
    classes: scaled(base.classes),
    enrollments: scaled(base.enrollments),
    batchSize: base.batchSize,
  };
}

export function validateScale(scale: ScaleConfig): void {
  for (const [key, value] of Object.entries(scale)) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a positive integer, got ${String(value)}`);
    }
  }
}

// Uniform pick among parent ids 1..count; ids come from a freshly created SERIAL.
function randomId(count: number): string {
  return `1 + floor(random() * ${String(count)})::int`;
}

const randomName = "initcap(substr(md5(random()::text), 1, 8))";

/**
 * Bulk INSERT of `rows` synthetic rows. `offset` is the number of rows already
 * generated for the table and only affects the generated course names.
 */
export function insertStatement(
  table: TableName,
  rows: number,
  scale: ScaleConfig,
  offset = 0
): string {
  const series = `generate_series(1, ${String(rows)}) AS g`;
  switch (table) {
    case "student":
      return (
        `INSERT INTO student (first_name, last_name, gender) ` +
        `SELECT ${randomName}, ${randomName}, ` +
        `(ARRAY[${GENDERS.map((g) => `'${g}'`).join(", ")}])[${randomId(GENDERS.length)}] ` +
        `FROM ${series}`
      );
    case "course":
      return (
        `INSERT INTO course (name, credits) ` +
        `SELECT 'Course ' || (g + ${String(offset)}), ` +
        `${String(MIN_CREDITS - 1)} + ${randomId(MAX_CREDITS - MIN_CREDITS + 1)} ` +
        `FROM ${series}`
      );
    case "class":
      return `INSERT INTO class (course_id) SELECT ${randomId(scale.courses)} FROM ${series}`;
    case "enrollment":
      return (
        `INSERT INTO enrollment (class_id, student_id) ` +
        `SELECT ${randomId(scale.classes)}, ${randomId(scale.students)} FROM ${series}`
      );
  }
}

export interface GenerationProgress {
  table: TableName;
  inserted: number;
  total: number;
}

export interface GenerationResult {
  rowsInserted: RowCounts;
  durationMs: number;
}

/**
 * Fill the four tables parent-first, in batches of at most `batchSize` rows.
 * Expects a freshly provisioned (empty) schema.
 */
export async function generateData(
  runner: DatabaseRunner,
  scale: ScaleConfig,
  onProgress?: (progress: GenerationProgress) => void
): Promise<GenerationResult> {
  validateScale(scale);
  const start = performance.now();
  const rowsInserted: RowCounts = { student: 0, course: 0, class: 0, enrollment: 0 };

  for (const table of TABLES) {
    const total = requestedRows(scale, table);
    while (rowsInserted[table] < total) {
      const batch = Math.min(scale.batchSize, total - rowsInserted[table]);
      await runner.execute(insertStatement(table, batch, scale, rowsInserted[table]));
      rowsInserted[table] += batch;
      onProgress?.({ table, inserted: rowsInserted[table], total });
    }
  }

  // Fresh statistics so the planner sees the generated volumes
  await runner.execute(`ANALYZE ${TABLES.join(", ")}`);

  return { rowsInserted, durationMs: performance.now() - start };
}

export async function countRows(runner: DatabaseRunner): Promise<RowCounts> {
  const counts: RowCounts = { student: 0, course: 0, class: 0, enrollment: 0 };
  for (const table of TABLES) {
    const rows = await runner.execute(`SELECT COUNT(*)::int AS count FROM ${table}`);
    counts[table] = toNumber(rows[0]?.count ?? 0);
  }
  return counts;
}
