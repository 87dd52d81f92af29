// pattern: Functional Core
import { z } from "zod";
import { isValidNamespace } from "../keys/codec.ts";
import { MAX_TIMEOUT } from "../retrieval/deadline.ts";

const StoreConfigSchema = z.object({
  namespace: z
    .string()
    .refine(isValidNamespace, {
      message: "namespace must be a SQL identifier of at most 63 characters",
    })
    .default("task_results"),
  channel: z.string().min(1).max(63).default("task_results"),
  default_timeout: z.number().int().nonnegative().max(MAX_TIMEOUT).default(10000),
  default_ttl: z.number().int().positive().default(600000),
  poll_interval: z.number().int().nonnegative().max(MAX_TIMEOUT).default(0),
  listener_capacity: z.number().int().positive().default(256),
});

const DatabaseConfigSchema = z.object({
  url: z.string().url(),
  connect_timeout: z.number().int().nonnegative().default(5000),
  pool_size: z.number().int().positive().default(10),
});

const AppConfigSchema = z.object({
  store: StoreConfigSchema.default({}),
  database: DatabaseConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export { AppConfigSchema, StoreConfigSchema, DatabaseConfigSchema };
