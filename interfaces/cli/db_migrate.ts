import { parseArgs } from "node:util";

import { createPgClient } from "../../infra/db/client.js";
import { migrateUp, migrationStatus, rollbackLast } from "../../infra/db/migrator.js";
import { readDatabaseUrl } from "../http/config.js";

const COMMANDS = ["up", "down", "status"] as const;
type Command = (typeof COMMANDS)[number];

function parseCommand(raw: string | undefined): Command {
  const command = COMMANDS.find((candidate) => candidate === (raw ?? "up"));
  if (!command) {
    throw new Error(`Unsupported db_migrate command: ${raw}`);
  }
  return command;
}

async function main(): Promise<void> {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      steps: { type: "string" },
      dir: { type: "string" },
    },
  });

  const command = parseCommand(positionals[0]);
  const options = { migrationsDir: values.dir };

  const client = createPgClient({ databaseUrl: readDatabaseUrl(), applicationName: "zen-connect-migrate" });
  await client.connect();
  try {
    if (command === "up") {
      console.log(JSON.stringify({ command, ...(await migrateUp(client, options)) }, null, 2));
      return;
    }

    if (command === "down") {
      const steps = Number.parseInt(values.steps ?? "1", 10);
      if (!Number.isFinite(steps) || steps < 1) {
        throw new Error("--steps must be a positive integer");
      }
      const result = await rollbackLast(client, steps, options);
      console.log(JSON.stringify({ command, steps, ...result }, null, 2));
      return;
    }

    console.log(JSON.stringify({ command, ...(await migrationStatus(client, options)) }, null, 2));
  } finally {
    await client.end();
  }
}

main().catch((error: unknown) => {
  console.error(JSON.stringify({ error: error instanceof Error ? error.message : String(error) }, null, 2));
  process.exitCode = 1;
});
