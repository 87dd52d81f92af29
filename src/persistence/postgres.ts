// pattern: Imperative Shell
import { Client, Pool } from "pg";
import type { PoolClient } from "pg";
import { ResultStoreError } from "../errors.ts";
import { quoteIdentifier } from "./sql.ts";
import type {
  ListenerConnection,
  ListenerHandlers,
  PersistenceProvider,
} from "./types.ts";
import type { DatabaseConfig } from "../config/schema.ts";

const CONNECTION_ERROR_CODES = new Set([
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57P03", // cannot_connect_now
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "EPIPE",
  "ETIMEDOUT",
]);

const CONNECTION_ERROR_MESSAGE =
  /connection terminated|timeout expired|timeout exceeded when trying to connect|client has encountered a connection error|not queryable/i;

/**
 * True when the error means the database connection is gone, as opposed to a
 * failed statement on a healthy connection. SQLSTATE class 08 is
 * "connection exception".
 */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ("code" in error && typeof error.code === "string") {
    if (error.code.startsWith("08") || CONNECTION_ERROR_CODES.has(error.code)) {
      return true;
    }
  }
  return CONNECTION_ERROR_MESSAGE.test(error.message);
}

function asConnectionLost(error: unknown): unknown {
  if (!isConnectionError(error) || error instanceof ResultStoreError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ResultStoreError(
    "connection_lost",
    true,
    `database connection lost: ${message}`,
    { cause: error },
  );
}

export function createPostgresProvider(
  config: DatabaseConfig,
): PersistenceProvider {
  const pool = new Pool({
    connectionString: config.url,
    max: config.pool_size,
    connectionTimeoutMillis: config.connect_timeout,
  });

  // An idle pooled client that loses its connection emits here; without a
  // listener the process would crash. The next checkout gets a fresh client.
  pool.on("error", (error) => {
    console.error("[persistence] idle client error:", error.message);
  });

  async function checkout(): Promise<PoolClient> {
    try {
      return await pool.connect();
    } catch (error) {
      throw asConnectionLost(error);
    }
  }

  async function connect(): Promise<void> {
    const client = await checkout();
    client.release();
  }

  async function disconnect(): Promise<void> {
    await pool.end();
  }

  async function query<T extends Record<string, unknown>>(
    sql: string,
    params?: ReadonlyArray<unknown>,
  ): Promise<Array<T>> {
    try {
      const result = await pool.query<T>(sql, params ? [...params] : undefined);
      return result.rows;
    } catch (error) {
      throw asConnectionLost(error);
    }
  }

  async function withTransaction<T>(
    fn: (queryFn: typeof query) => Promise<T>,
  ): Promise<T> {
    const client = await checkout();
    let broken = false;
    const txQuery = async <R extends Record<string, unknown>>(
      sql: string,
      params?: ReadonlyArray<unknown>,
    ): Promise<Array<R>> => {
      try {
        const result = await client.query<R>(sql, params ? [...params] : undefined);
        return result.rows;
      } catch (error) {
        broken = broken || isConnectionError(error);
        throw asConnectionLost(error);
      }
    };
    try {
      await txQuery("BEGIN");
      const result = await fn(txQuery);
      await txQuery("COMMIT");
      return result;
    } catch (error) {
      if (!broken) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          broken = true;
          console.error("[persistence] rollback failed:", rollbackError);
        }
      }
      throw error;
    } finally {
      // a broken client is destroyed instead of going back to the pool
      client.release(broken);
    }
  }

  async function openListenerConnection(
    handlers: ListenerHandlers,
  ): Promise<ListenerConnection> {
    const client = new Client({
      connectionString: config.url,
      connectionTimeoutMillis: config.connect_timeout,
    });
    let active = false;
    let closing = false;

    const fail = (error: Error): void => {
      if (!active || closing) return;
      active = false;
      handlers.onError(error);
    };

    client.on("notification", (message) => {
      handlers.onNotification(message.channel, message.payload ?? "");
    });
    client.on("error", (error) => fail(error));
    client.on("end", () => fail(new Error("listener connection ended")));

    await client.connect();
    active = true;

    return {
      async listen(channel: string): Promise<void> {
        await client.query(`LISTEN ${quoteIdentifier(channel)}`);
      },
      async close(): Promise<void> {
        if (closing) return;
        closing = true;
        await client.end();
      },
    };
  }

  return {
    connect,
    disconnect,
    query,
    withTransaction,
    openListenerConnection,
  };
}
