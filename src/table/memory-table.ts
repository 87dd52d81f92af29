// pattern: Imperative Shell

import { validateTtl } from "./types.ts";
import type { StorageKey } from "../keys/codec.ts";
import type { NotificationChannel } from "../notifications/types.ts";
import type { ResultRecord, ResultTable, Ttl } from "./types.ts";

export type MemoryResultTableOptions = {
  channel: NotificationChannel;
  /** Clock in epoch milliseconds, used for created_at and expiry. */
  now?: () => number;
};

/**
 * In-process implementation of the ResultTable port, for single-process
 * deployments and tests. Expiry is lazy, as in the Postgres table.
 */
export function createMemoryResultTable(
  options: MemoryResultTableOptions,
): ResultTable {
  const { channel } = options;
  const now = options.now ?? Date.now;
  const records = new Map<StorageKey, ResultRecord>();

  function isExpired(record: ResultRecord): boolean {
    return record.expires_at !== null && record.expires_at.getTime() <= now();
  }

  return {
    async ensureSchema(): Promise<void> {
      // nothing to create
    },

    async put(key: StorageKey, payload: Uint8Array, ttl: Ttl): Promise<void> {
      validateTtl(ttl);
      const createdAt = now();
      records.set(key, {
        key,
        payload: new Uint8Array(payload),
        created_at: new Date(createdAt),
        expires_at: ttl === null ? null : new Date(createdAt + ttl),
      });
      await channel.publish(key);
    },

    async get(key: StorageKey): Promise<ResultRecord | null> {
      const record = records.get(key);
      if (!record || isExpired(record)) {
        return null;
      }
      return { ...record, payload: new Uint8Array(record.payload) };
    },

    async purgeExpired(): Promise<number> {
      let purged = 0;
      for (const [key, record] of records) {
        if (isExpired(record)) {
          records.delete(key);
          purged++;
        }
      }
      return purged;
    },
  };
}
