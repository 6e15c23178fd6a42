import type { Stats } from "./types.js";

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 10) return `${ms.toFixed(2)}ms`;
  if (ms < 1000) return `${String(Math.round(ms))}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  if (ms < 3600_000) {
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1000);
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  const hours = Math.floor(ms / 3600_000);
  const minutes = Math.floor((ms % 3600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`;
}

const BYTE_UNITS = ["kB", "MB", "GB", "TB"];

/**
 * Format a byte count the way pg_size_pretty does (1024-based, integer units)
 */
export function formatBytes(bytes: number): string {
  if (bytes < 10 * 1024) return `${String(bytes)} bytes`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 10 * 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${String(Math.round(value))} ${BYTE_UNITS[unit] ?? "TB"}`;
}

/**
 * Calculate statistics from an array of numbers
 */
export function calculateStats(values: number[]): Stats {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0, median: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
    median: sorted[Math.floor(sorted.length / 2)] ?? 0,
    p95: sorted[Math.floor(sorted.length * 0.95)] ?? 0,
  };
}

// Parse number with underscore separators (e.g., 1_000_000)
export function parseNumber(value: string): number {
  const cleaned = value.replace(/_/g, "");
  return /^-?\d+(\.\d+)?$/.test(cleaned) ? Number(cleaned) : NaN;
}

/**
 * Numeric column value as a number. postgres.js returns int8/numeric as
 * strings, PGlite as numbers or bigints.
 */
export function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint" || typeof value === "string") return Number(value);
  throw new TypeError(`Expected a numeric value, got ${typeof value}`);
}
