// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export type { AppConfig, StoreConfig, DatabaseConfig } from "./schema.ts";

function section(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed: Record<string, unknown> = TOML.parse(raw);

  // Environment variable overrides for deployment-specific values
  const envOverrides: Record<string, unknown> = {};

  if (process.env["DATABASE_URL"]) {
    const databaseObj = section(parsed["database"]);
    databaseObj["url"] = process.env["DATABASE_URL"];
    envOverrides["database"] = databaseObj;
  }

  if (process.env["RESULT_STORE_NAMESPACE"]) {
    const storeObj = section(parsed["store"]);
    storeObj["namespace"] = process.env["RESULT_STORE_NAMESPACE"];
    envOverrides["store"] = storeObj;
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}
