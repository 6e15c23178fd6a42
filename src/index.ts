export { connectionFromEnv, DEFAULT_CONNECTION, type ConnectionConfig } from "./config.js";
export {
  countRows,
  DEFAULT_SCALE,
  generateData,
  insertStatement,
  scaleCounts,
  type GenerationResult,
} from "./data-generator.js";
export {
  DEFAULT_CONTAINER,
  startContainer,
  stopContainer,
  waitForDatabase,
  type ContainerConfig,
} from "./docker.js";
export { BenchmarkError, ConfigError, NotConnectedError } from "./errors.js";
export {
  createDerivedObjects,
  demonstrateStaleness,
  JOIN_QUERY,
  MATERIALIZED_VIEW_NAME,
  QUERY_VARIANTS,
  refreshMaterializedView,
  verifyEquivalence,
  VIEW_NAME,
  type StalenessResult,
} from "./queries.js";
export { generateMarkdown, writeReport, type BenchmarkReport } from "./report.js";
export {
  benchmarkVariant,
  type DatabaseRunner,
  PostgresRunner,
  runBenchmark,
} from "./runners.js";
export { provisionSchema, TABLES } from "./schema.js";
export { inspectSpace } from "./space.js";
export type * from "./types.js";
export { calculateStats, formatBytes, formatDuration } from "./utils.js";
