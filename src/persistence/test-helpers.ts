// pattern: Imperative Shell

/**
 * In-process stand-in for PostgreSQL, for tests.
 * Interprets the statements the result table and notification channel issue:
 * rows live in a Map, NOW() is `clock.now`, and pg_notify inside a
 * transaction is held back until the transaction commits.
 */

import type {
  ListenerConnection,
  ListenerHandlers,
  PersistenceProvider,
  QueryFunction,
} from "./types.ts";
import type { ColumnRow } from "../table/postgres-table.ts";

export type RecordedQuery = {
  sql: string;
  params: ReadonlyArray<unknown>;
  inTransaction: boolean;
};

type FakeRow = {
  key: string;
  payload: Buffer;
  created_at: Date;
  expires_at: Date | null;
};

type FakeListener = {
  handlers: ListenerHandlers;
  channels: Set<string>;
};

export type FakePersistence = PersistenceProvider & {
  readonly queries: Array<RecordedQuery>;
  readonly rows: Map<string, FakeRow>;
  readonly clock: { now: number };
  columns: Array<ColumnRow>;
  /** Number of listener connections opened so far. */
  readonly listenersOpened: number;
  readonly openListeners: number;
  failNextQuery(error: Error): void;
  failNextListenerOpen(error: Error): void;
  /** Deliver a notification as if another session ran NOTIFY. */
  notify(channel: string, payload: string): void;
  /** Kill every open listener connection. */
  dropListeners(error: Error): void;
};

export const RESULT_TABLE_COLUMNS: Array<ColumnRow> = [
  { column_name: "key", data_type: "character varying", character_maximum_length: 256 },
  { column_name: "payload", data_type: "bytea", character_maximum_length: null },
  { column_name: "created_at", data_type: "timestamp with time zone", character_maximum_length: null },
  { column_name: "expires_at", data_type: "timestamp with time zone", character_maximum_length: null },
];

export function createFakePersistence(): FakePersistence {
  const queries: Array<RecordedQuery> = [];
  const rows = new Map<string, FakeRow>();
  const clock = { now: Date.parse("2026-01-01T00:00:00.000Z") };
  const listeners = new Set<FakeListener>();
  let listenersOpened = 0;
  let queryError: Error | null = null;
  let listenerError: Error | null = null;

  function deliver(channel: string, payload: string): void {
    for (const listener of [...listeners]) {
      if (listener.channels.has(channel)) {
        listener.handlers.onNotification(channel, payload);
      }
    }
  }

  function isLive(row: FakeRow): boolean {
    return row.expires_at === null || row.expires_at.getTime() > clock.now;
  }

  function execute(
    sql: string,
    params: ReadonlyArray<unknown>,
    pending: Array<[string, string]> | null,
  ): Array<Record<string, unknown>> {
    queries.push({ sql, params, inTransaction: pending !== null });

    if (queryError) {
      const error = queryError;
      queryError = null;
      throw error;
    }

    if (sql.includes("CREATE TABLE")) {
      return [];
    }

    if (sql.includes("information_schema.columns")) {
      return fake.columns;
    }

    if (sql.includes("INSERT INTO")) {
      const [key, payload, ttl] = params;
      if (typeof key !== "string" || !(payload instanceof Uint8Array)) {
        throw new Error("unexpected INSERT parameters");
      }
      rows.set(key, {
        key,
        payload: Buffer.from(payload),
        created_at: new Date(clock.now),
        expires_at: typeof ttl === "number" ? new Date(clock.now + ttl) : null,
      });
      return [];
    }

    if (sql.includes("pg_notify")) {
      const [channel, payload] = params;
      if (typeof channel !== "string" || typeof payload !== "string") {
        throw new Error("unexpected pg_notify parameters");
      }
      if (pending) {
        pending.push([channel, payload]);
      } else {
        deliver(channel, payload);
      }
      return [{ pg_notify: "" }];
    }

    if (sql.includes("DELETE FROM")) {
      const deleted: Array<Record<string, unknown>> = [];
      for (const [key, row] of rows) {
        if (!isLive(row)) {
          rows.delete(key);
          deleted.push({ key });
        }
      }
      return deleted;
    }

    if (sql.includes("SELECT key, payload")) {
      const row = rows.get(String(params[0]));
      return row && isLive(row) ? [{ ...row }] : [];
    }

    throw new Error(`unexpected query: ${sql}`);
  }

  const query: QueryFunction = async <T extends Record<string, unknown>>(
    sql: string,
    params?: ReadonlyArray<unknown>,
  ): Promise<Array<T>> => {
    // rows are shaped by the statement, as with the real driver
    return execute(sql, params ?? [], null) as Array<T>;
  };

  async function withTransaction<T>(
    fn: (queryFn: QueryFunction) => Promise<T>,
  ): Promise<T> {
    const pending: Array<[string, string]> = [];
    const txQuery: QueryFunction = async <R extends Record<string, unknown>>(
      sql: string,
      params?: ReadonlyArray<unknown>,
    ): Promise<Array<R>> => {
      return execute(sql, params ?? [], pending) as Array<R>;
    };
    const result = await fn(txQuery);
    // commit: notifications go out only now
    for (const [channel, payload] of pending) {
      deliver(channel, payload);
    }
    return result;
  }

  async function openListenerConnection(
    handlers: ListenerHandlers,
  ): Promise<ListenerConnection> {
    if (listenerError) {
      const error = listenerError;
      listenerError = null;
      throw error;
    }
    listenersOpened++;
    const listener: FakeListener = { handlers, channels: new Set() };
    listeners.add(listener);
    return {
      async listen(channel: string): Promise<void> {
        listener.channels.add(channel);
      },
      async close(): Promise<void> {
        listeners.delete(listener);
      },
    };
  }

  const fake: FakePersistence = {
    async connect(): Promise<void> {},
    async disconnect(): Promise<void> {},
    query,
    withTransaction,
    openListenerConnection,
    queries,
    rows,
    clock,
    columns: [...RESULT_TABLE_COLUMNS],
    get listenersOpened(): number {
      return listenersOpened;
    },
    get openListeners(): number {
      return listeners.size;
    },
    failNextQuery(error: Error): void {
      queryError = error;
    },
    failNextListenerOpen(error: Error): void {
      listenerError = error;
    },
    notify: deliver,
    dropListeners(error: Error): void {
      for (const listener of [...listeners]) {
        listeners.delete(listener);
        listener.handlers.onError(error);
      }
    },
  };

  return fake;
}
