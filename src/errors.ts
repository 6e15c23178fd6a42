export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class NotConnectedError extends Error {
  constructor(runner: string) {
    super(`Not connected (${runner})`);
    this.name = "NotConnectedError";
  }
}

/**
 * Failure of one orchestration step (provisioning, generation, refresh...).
 * The original error is kept as `cause`.
 */
export class BenchmarkError extends Error {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`${step} failed: ${errorMessage(cause)}`, { cause });
    this.name = "BenchmarkError";
    this.step = step;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new BenchmarkError(name, error);
  }
}
