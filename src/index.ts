// pattern: Functional Core (barrel export)

export {
  ResultStoreError,
  ResultFailure,
  isResultStoreError,
  type ResultStoreErrorCode,
} from "./errors.ts";

export {
  buildKey,
  buildDigestKey,
  buildMessageKey,
  isValidNamespace,
  MAX_KEY_LENGTH,
  type StorageKey,
  type MessageIdentity,
} from "./keys/codec.ts";

export { loadConfig } from "./config/config.ts";
export {
  AppConfigSchema,
  StoreConfigSchema,
  DatabaseConfigSchema,
  type AppConfig,
  type StoreConfig,
  type DatabaseConfig,
} from "./config/schema.ts";

export type {
  PersistenceProvider,
  QueryFunction,
  ListenerConnection,
  ListenerHandlers,
} from "./persistence/types.ts";
export { createPostgresProvider, isConnectionError } from "./persistence/postgres.ts";

export type { ResultRecord, ResultTable, Ttl } from "./table/types.ts";
export { createPostgresResultTable } from "./table/postgres-table.ts";
export { createMemoryResultTable } from "./table/memory-table.ts";

export type {
  NotificationChannel,
  NotificationEvent,
  Subscription,
} from "./notifications/types.ts";
export { createPostgresNotificationChannel } from "./notifications/postgres-channel.ts";
export { createMemoryNotificationChannel } from "./notifications/memory-channel.ts";

export {
  createResultCoordinator,
  type ResultCoordinator,
  type RetrievalOptions,
} from "./retrieval/coordinator.ts";

export { createResultStore, type ResultStore } from "./store/result-store.ts";
export {
  createPostgresResultStore,
  createMemoryResultStore,
  type MemoryResultStoreOptions,
} from "./store/factory.ts";

export { createJsonEncoder, type Encoder } from "./encoding/encoder.ts";
export { createTaskResults, type TaskResults } from "./encoding/task-results.ts";
