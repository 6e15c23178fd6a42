import { ConfigError } from "./errors.js";
import { parseNumber } from "./utils.js";

export interface ConnectionConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
}

export const DEFAULT_CONNECTION: ConnectionConfig = {
  host: "localhost",
  port: 5432,
  database: "benchmarks",
  username: "postgres",
  password: "postgres",
};

type Env = Record<string, string | undefined>;

/**
 * Connection settings, overridable with the standard libpq variables.
 */
export function connectionFromEnv(env: Env = process.env): ConnectionConfig {
  return {
    host: env.PGHOST ?? DEFAULT_CONNECTION.host,
    port: env.PGPORT ? parseInteger("PGPORT", env.PGPORT, 1) : DEFAULT_CONNECTION.port,
    database: env.PGDATABASE ?? DEFAULT_CONNECTION.database,
    username: env.PGUSER ?? DEFAULT_CONNECTION.username,
    password: env.PGPASSWORD ?? DEFAULT_CONNECTION.password,
  };
}

export function parseInteger(name: string, value: string, min = 0): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${name} must be an integer >= ${String(min)}, got "${value}"`);
  }
  return n;
}

export function parsePositiveNumber(name: string, value: string): number {
  const n = parseNumber(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${value}"`);
  }
  return n;
}
