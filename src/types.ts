export type SqlParam = string | number | boolean | null;

export type Row = Record<string, unknown>;

export type TableName = "student" | "course" | "class" | "enrollment";

export type VariantKind = "join" | "view" | "materialized-view";

export interface QueryVariant {
  name: string;
  description: string;
  kind: VariantKind;
  sql: string;
}

export interface BenchmarkResult {
  query: string;
  durationMs: number;
  rowsReturned: number;
  error?: string;
}

export interface Stats {
  min: number;
  max: number;
  avg: number;
  median: number;
  p95: number;
}

export interface VariantResult {
  variant: string;
  description: string;
  kind: VariantKind;
  rowsReturned: number;
  minMs: number;
  avgMs: number;
  medianMs: number;
  p95Ms: number;
  maxMs: number;
  /** Measured runs, excluding warmup. */
  runs: number;
  errors: string[];
}

export interface ScaleConfig {
  students: number;
  courses: number;
  classes: number;
  enrollments: number;
  batchSize: number;
}

export type RowCounts = Record<TableName, number>;

export interface EquivalenceResult {
  variant: string;
  missing: number;
  extra: number;
  equivalent: boolean;
  error?: string;
}

export type RelationKind = "table" | "view" | "materialized view";

export type Persistence = "permanent" | "unlogged" | "temporary";

export interface SpaceEntry {
  name: string;
  kind: RelationKind;
  persistence: Persistence;
  dataBytes: number;
  totalBytes: number;
  populated: boolean | null;
}
