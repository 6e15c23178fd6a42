import { parseArgs } from "node:util";
import { connectionFromEnv, parseInteger, parsePositiveNumber } from "./config.js";
import { countRows, DEFAULT_SCALE, generateData, scaleCounts } from "./data-generator.js";
import { step } from "./errors.js";
import { createDerivedObjects } from "./queries.js";
import { PostgresRunner } from "./runners.js";
import { provisionSchema } from "./schema.js";
import type { ScaleConfig } from "./types.js";
import { formatDuration } from "./utils.js";

const { values } = parseArgs({
  options: {
    scale: { type: "string", short: "s", default: "1" },
    students: { type: "string" },
    courses: { type: "string" },
    classes: { type: "string" },
    enrollments: { type: "string", short: "n" },
    batch: { type: "string", short: "b" },
    "no-data": { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
});

if (values.help) {
  console.log(`
Usage: npm run generate -- [options]

Options:
  -s, --scale <f>        Multiply the default row counts (default: 1)
  --students <n>         Students (default: ${DEFAULT_SCALE.students.toLocaleString()})
  --courses <n>          Courses (default: ${DEFAULT_SCALE.courses.toLocaleString()})
  --classes <n>          Classes (default: ${DEFAULT_SCALE.classes.toLocaleString()})
  -n, --enrollments <n>  Enrollments (default: ${DEFAULT_SCALE.enrollments.toLocaleString()})
  -b, --batch <n>        Rows per INSERT (default: ${DEFAULT_SCALE.batchSize.toLocaleString()})
  --no-data              Create the materialized view WITH NO DATA
  -h, --help             Show this help message

Connection settings come from PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD.

Examples:
  npm run generate                          # Default volumes
  npm run generate -- -s 0.01               # 1% of the default volumes
  npm run generate -- -n 5_000_000 -b 250_000
`);
  process.exit(0);
}

function resolveScale(): ScaleConfig {
  const scaled = scaleCounts(parsePositiveNumber("--scale", values.scale));
  return {
    students: values.students ? parseInteger("--students", values.students, 1) : scaled.students,
    courses: values.courses ? parseInteger("--courses", values.courses, 1) : scaled.courses,
    classes: values.classes ? parseInteger("--classes", values.classes, 1) : scaled.classes,
    enrollments: values.enrollments
      ? parseInteger("--enrollments", values.enrollments, 1)
      : scaled.enrollments,
    batchSize: values.batch ? parseInteger("--batch", values.batch, 1) : scaled.batchSize,
  };
}

async function main(): Promise<void> {
  const scale = resolveScale();
  const runner = new PostgresRunner(connectionFromEnv());

  console.log("=== Generating benchmark data ===");
  console.log(
    `students=${scale.students.toLocaleString()}, courses=${scale.courses.toLocaleString()}, ` +
      `classes=${scale.classes.toLocaleString()}, enrollments=${scale.enrollments.toLocaleString()}`
  );

  await runner.connect();
  try {
    await step("provision schema", () => provisionSchema(runner, { dropFirst: true }));
    console.log("Schema created");

    const result = await step("generate data", () =>
      generateData(runner, scale, ({ table, inserted, total }) => {
        console.log(`  ${table}: ${inserted.toLocaleString()}/${total.toLocaleString()}`);
      })
    );
    console.log(`Generated data in ${formatDuration(result.durationMs)}`);

    const withData = !values["no-data"];
    await step("create view and materialized view", () =>
      createDerivedObjects(runner, { withData })
    );
    console.log(`Created view and materialized view (${withData ? "WITH DATA" : "WITH NO DATA"})`);

    const counts = await countRows(runner);
    for (const [table, count] of Object.entries(counts)) {
      console.log(`  ${table}: ${count.toLocaleString()} rows`);
    }
  } finally {
    await runner.disconnect();
  }

  console.log("\nDone!");
}

main().catch((err: unknown) => {
  console.error("Error:", err);
  process.exit(1);
});
