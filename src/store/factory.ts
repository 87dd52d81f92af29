// pattern: Imperative Shell

import type { z } from "zod";
import { StoreConfigSchema } from "../config/schema.ts";
import type { AppConfig } from "../config/schema.ts";
import { createPostgresProvider } from "../persistence/postgres.ts";
import { createPostgresNotificationChannel } from "../notifications/postgres-channel.ts";
import { createMemoryNotificationChannel } from "../notifications/memory-channel.ts";
import { createPostgresResultTable } from "../table/postgres-table.ts";
import { createMemoryResultTable } from "../table/memory-table.ts";
import { createResultStore } from "./result-store.ts";
import type { ResultStore } from "./result-store.ts";

/**
 * Store backed by PostgreSQL: a connection pool for reads and writes, plus
 * one dedicated listener connection opened on the first blocking read.
 */
export function createPostgresResultStore(config: AppConfig): ResultStore {
  const persistence = createPostgresProvider(config.database);
  const channel = createPostgresNotificationChannel(persistence, {
    name: config.store.channel,
    capacity: config.store.listener_capacity,
  });
  const table = createPostgresResultTable(persistence, {
    namespace: config.store.namespace,
    channel,
  });

  return createResultStore({
    namespace: config.store.namespace,
    table,
    channel,
    defaultTimeout: config.store.default_timeout,
    defaultTtl: config.store.default_ttl,
    pollInterval: config.store.poll_interval,
    onClose: () => persistence.disconnect(),
  });
}

export type MemoryResultStoreOptions = z.input<typeof StoreConfigSchema> & {
  now?: () => number;
};

/** Store living entirely in this process; results vanish with it. */
export function createMemoryResultStore(
  options: MemoryResultStoreOptions = {},
): ResultStore {
  const { now, ...settings } = options;
  const store = StoreConfigSchema.parse(settings);
  const channel = createMemoryNotificationChannel({
    name: store.channel,
    capacity: store.listener_capacity,
  });
  const table = createMemoryResultTable({ channel, now });

  return createResultStore({
    namespace: store.namespace,
    table,
    channel,
    defaultTimeout: store.default_timeout,
    defaultTtl: store.default_ttl,
    pollInterval: store.poll_interval,
  });
}
