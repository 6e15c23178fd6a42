import type { DatabaseRunner } from "./runners.js";
import type { TableName } from "./types.js";
import { MATERIALIZED_VIEW_NAME, VIEW_NAME } from "./queries.js";

/** Parent tables come before the tables referencing them. */
export const TABLES: readonly TableName[] = ["student", "course", "class", "enrollment"];

export const GENDERS = ["M", "F"] as const;

export const MIN_CREDITS = 1;
export const MAX_CREDITS = 6;

const TABLE_DDL: Record<TableName, string> = {
  student: `CREATE TABLE student (
  id SERIAL PRIMARY KEY,
  first_name VARCHAR(50) NOT NULL,
  last_name VARCHAR(50) NOT NULL,
  gender CHAR(1) NOT NULL CHECK (gender IN (${GENDERS.map((g) => `'${g}'`).join(", ")}))
)`,
  course: `CREATE TABLE course (
  id SERIAL PRIMARY KEY,
  name VARCHAR(100) NOT NULL,
  credits INTEGER NOT NULL CHECK (credits BETWEEN ${String(MIN_CREDITS)} AND ${String(MAX_CREDITS)})
)`,
  class: `CREATE TABLE class (
  id SERIAL PRIMARY KEY,
  course_id INTEGER NOT NULL REFERENCES course (id)
)`,
  enrollment: `CREATE TABLE enrollment (
  id SERIAL PRIMARY KEY,
  class_id INTEGER NOT NULL REFERENCES class (id),
  student_id INTEGER NOT NULL REFERENCES student (id)
)`,
};

export function createTableStatements(): string[] {
  return TABLES.map((table) => TABLE_DDL[table]);
}

/**
 * Derived objects first, then tables child-first.
 */
export function dropStatements(): string[] {
  return [
    `DROP MATERIALIZED VIEW IF EXISTS ${MATERIALIZED_VIEW_NAME}`,
    `DROP VIEW IF EXISTS ${VIEW_NAME}`,
    ...[...TABLES].reverse().map((table) => `DROP TABLE IF EXISTS ${table} CASCADE`),
  ];
}

export async function provisionSchema(
  runner: DatabaseRunner,
  options: { dropFirst: boolean } = { dropFirst: true }
): Promise<void> {
  const statements = options.dropFirst
    ? [...dropStatements(), ...createTableStatements()]
    : createTableStatements();

  for (const statement of statements) {
    await runner.execute(statement);
  }
}
