import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage } from "./errors.js";
import type { DatabaseRunner } from "./runners.js";

const execFileAsync = promisify(execFile);

export interface ContainerConfig {
  name: string;
  image: string;
  port: number;
  password: string;
  database: string;
}

export const DEFAULT_CONTAINER: ContainerConfig = {
  name: "matview-benchmarks-postgres",
  image: "postgres:16",
  port: 5432,
  password: "postgres",
  database: "benchmarks",
};

export function startArgs(config: ContainerConfig): string[] {
  return [
    "run",
    "--detach",
    "--rm",
    "--name",
    config.name,
    "--publish",
    `${String(config.port)}:5432`,
    "--env",
    `POSTGRES_PASSWORD=${config.password}`,
    "--env",
    `POSTGRES_DB=${config.database}`,
    config.image,
  ];
}

export function stopArgs(config: ContainerConfig): string[] {
  return ["stop", config.name];
}

async function docker(args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("docker", args);
  return stdout.trim();
}

/**
 * Returns the container id printed by `docker run`.
 */
export function startContainer(config: ContainerConfig = DEFAULT_CONTAINER): Promise<string> {
  return docker(startArgs(config));
}

export async function stopContainer(config: ContainerConfig = DEFAULT_CONTAINER): Promise<void> {
  await docker(stopArgs(config));
}

/**
 * Poll with `SELECT 1` until the server accepts queries or `timeoutMs` passes.
 */
export async function waitForDatabase(
  runner: DatabaseRunner,
  options: { timeoutMs: number; intervalMs: number } = { timeoutMs: 30_000, intervalMs: 500 }
): Promise<void> {
  const deadline = Date.now() + options.timeoutMs;
  let lastError: unknown;

  while (Date.now() < deadline) {
    try {
      await runner.execute("SELECT 1");
      return;
    } catch (error) {
      lastError = error;
      await new Promise((resolve) => setTimeout(resolve, options.intervalMs));
    }
  }

  throw new Error(
    `Database not ready after ${String(options.timeoutMs)}ms: ${errorMessage(lastError)}`
  );
}
