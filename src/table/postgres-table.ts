// pattern: Imperative Shell

/**
 * PostgreSQL implementation of the ResultTable port.
 * One table per namespace, named after it. Expiry is compared against the
 * database clock so readers on different hosts agree on it.
 */

import { ResultStoreError } from "../errors.ts";
import { MAX_KEY_LENGTH } from "../keys/codec.ts";
import { quoteIdentifier } from "../persistence/sql.ts";
import { validateTtl } from "./types.ts";
import type { StorageKey } from "../keys/codec.ts";
import type { NotificationChannel } from "../notifications/types.ts";
import type { PersistenceProvider } from "../persistence/types.ts";
import type { ResultRecord, ResultTable, Ttl } from "./types.ts";

export type PostgresResultTableOptions = {
  namespace: string;
  channel: NotificationChannel;
};

type ResultRow = {
  key: string;
  payload: Uint8Array;
  created_at: Date | string;
  expires_at: Date | string | null;
};

export type ColumnRow = {
  column_name: string;
  data_type: string;
  character_maximum_length: number | string | null;
};

const EXPECTED_COLUMNS: ReadonlyArray<{ name: string; type: string }> = [
  { name: "key", type: "character varying" },
  { name: "payload", type: "bytea" },
  { name: "created_at", type: "timestamp with time zone" },
  { name: "expires_at", type: "timestamp with time zone" },
];

// duplicate_table, and the pg_type unique violation two concurrent
// CREATE TABLE IF NOT EXISTS can raise
const CREATE_RACE_CODES = new Set(["42P07", "23505"]);

function sqlState(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function parseResultRow(row: ResultRow): ResultRecord {
  return {
    key: row.key,
    payload: row.payload,
    created_at: new Date(row.created_at),
    expires_at: row.expires_at ? new Date(row.expires_at) : null,
  };
}

export function describeSchemaProblems(
  columns: ReadonlyArray<ColumnRow>,
): Array<string> {
  const problems: Array<string> = [];
  const byName = new Map(
    columns.map((column): [string, ColumnRow] => [column.column_name, column]),
  );

  for (const expected of EXPECTED_COLUMNS) {
    const actual = byName.get(expected.name);
    if (!actual) {
      problems.push(`missing column ${expected.name}`);
      continue;
    }
    if (actual.data_type !== expected.type) {
      problems.push(
        `column ${expected.name} is ${actual.data_type}, expected ${expected.type}`,
      );
    }
  }

  const key = byName.get("key");
  if (key && key.data_type === "character varying" && key.character_maximum_length !== null) {
    const limit = Number(key.character_maximum_length);
    if (limit < MAX_KEY_LENGTH) {
      problems.push(`column key holds ${limit} characters, expected at least ${MAX_KEY_LENGTH}`);
    }
  }

  return problems;
}

export function createPostgresResultTable(
  persistence: PersistenceProvider,
  options: PostgresResultTableOptions,
): ResultTable {
  const { namespace, channel } = options;
  const table = quoteIdentifier(namespace);

  async function ensureSchema(): Promise<void> {
    try {
      await persistence.query(`
        CREATE TABLE IF NOT EXISTS ${table} (
          key VARCHAR(${MAX_KEY_LENGTH}) PRIMARY KEY,
          payload BYTEA NOT NULL,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          expires_at TIMESTAMPTZ NULL
        )
      `);
    } catch (error) {
      const code = sqlState(error);
      if (code === null || !CREATE_RACE_CODES.has(code)) {
        throw error;
      }
    }

    const columns = await persistence.query<ColumnRow>(
      `SELECT column_name, data_type, character_maximum_length
       FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = $1`,
      [namespace],
    );

    const problems = describeSchemaProblems(columns);
    if (problems.length > 0) {
      throw new ResultStoreError(
        "schema_mismatch",
        false,
        `result table ${table} does not match the expected layout: ${problems.join("; ")}`,
      );
    }
  }

  async function put(key: StorageKey, payload: Uint8Array, ttl: Ttl): Promise<void> {
    validateTtl(ttl);
    const ttlMs = ttl === null ? null : Math.ceil(ttl);

    // NOTIFY is delivered at COMMIT, so no listener hears about the key
    // before the row is visible
    await persistence.withTransaction(async (query) => {
      await query(
        `INSERT INTO ${table} (key, payload, created_at, expires_at)
         VALUES ($1, $2, NOW(), NOW() + $3::bigint * INTERVAL '1 millisecond')
         ON CONFLICT (key) DO UPDATE
         SET payload = EXCLUDED.payload,
             created_at = EXCLUDED.created_at,
             expires_at = EXCLUDED.expires_at`,
        [key, Buffer.from(payload), ttlMs],
      );
      await channel.publish(key, query);
    });
  }

  async function get(key: StorageKey): Promise<ResultRecord | null> {
    const rows = await persistence.query<ResultRow>(
      `SELECT key, payload, created_at, expires_at
       FROM ${table}
       WHERE key = $1 AND (expires_at IS NULL OR expires_at > NOW())`,
      [key],
    );
    const [row] = rows;
    return row ? parseResultRow(row) : null;
  }

  async function purgeExpired(): Promise<number> {
    const rows = await persistence.query<{ key: string }>(
      `DELETE FROM ${table}
       WHERE expires_at IS NOT NULL AND expires_at <= NOW()
       RETURNING key`,
    );
    return rows.length;
  }

  return {
    ensureSchema,
    put,
    get,
    purgeExpired,
  };
}
