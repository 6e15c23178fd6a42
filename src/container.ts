import { parseArgs } from "node:util";
import { connectionFromEnv, parseInteger } from "./config.js";
import { DEFAULT_CONTAINER, startContainer, stopContainer, waitForDatabase } from "./docker.js";
import { PostgresRunner } from "./runners.js";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    name: { type: "string", default: DEFAULT_CONTAINER.name },
    image: { type: "string", default: DEFAULT_CONTAINER.image },
    port: { type: "string", short: "p", default: String(DEFAULT_CONTAINER.port) },
    help: { type: "boolean", short: "h", default: false },
  },
});

const command = positionals[0];

if (values.help || (command !== "start" && command !== "stop")) {
  console.log(`
Usage: npm run container -- <start|stop> [options]

Options:
  --name <name>    Container name (default: ${DEFAULT_CONTAINER.name})
  --image <image>  Image to run (default: ${DEFAULT_CONTAINER.image})
  -p, --port <n>   Host port mapped to 5432 (default: ${String(DEFAULT_CONTAINER.port)})
  -h, --help       Show this help message

The password and database come from PGPASSWORD and PGDATABASE.
`);
  process.exit(values.help ? 0 : 1);
}

async function main(): Promise<void> {
  const connection = connectionFromEnv();
  const config = {
    ...DEFAULT_CONTAINER,
    name: values.name,
    image: values.image,
    port: parseInteger("--port", values.port, 1),
    password: connection.password,
    database: connection.database,
  };

  if (command === "stop") {
    await stopContainer(config);
    console.log(`Stopped ${config.name}`);
    return;
  }

  const id = await startContainer(config);
  console.log(`Started ${config.name} (${id.slice(0, 12)}) on port ${String(config.port)}`);

  const runner = new PostgresRunner({ ...connection, port: config.port });
  await runner.connect();
  try {
    await waitForDatabase(runner);
    console.log("Database is ready");
  } finally {
    await runner.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
