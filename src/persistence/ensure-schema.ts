// pattern: Imperative Shell
import { loadConfig } from "../config/config.ts";
import { createPostgresProvider } from "./postgres.ts";
import { createPostgresNotificationChannel } from "../notifications/postgres-channel.ts";
import { createPostgresResultTable } from "../table/postgres-table.ts";

async function main(): Promise<void> {
  const config = loadConfig(process.argv[2]);
  const db = createPostgresProvider(config.database);
  const channel = createPostgresNotificationChannel(db, {
    name: config.store.channel,
    capacity: config.store.listener_capacity,
  });
  const table = createPostgresResultTable(db, {
    namespace: config.store.namespace,
    channel,
  });

  try {
    await db.connect();
    console.log("Connected to database");

    await table.ensureSchema();
    console.log(`Result table "${config.store.namespace}" ready`);
  } catch (error) {
    console.error("Schema setup failed:", error);
    process.exitCode = 1;
  } finally {
    await channel.close();
    await db.disconnect();
  }
}

await main();
