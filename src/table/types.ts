// pattern: Functional Core

/**
 * Result table port.
 * The table is the source of truth for results; notifications only tell a
 * waiting reader when to look again.
 */

import type { StorageKey } from "../keys/codec.ts";

export type ResultRecord = {
  key: StorageKey;
  payload: Uint8Array;
  created_at: Date;
  /** `null` means the record never expires. */
  expires_at: Date | null;
};

/**
 * Milliseconds until expiry, or `null` for a record that never expires.
 * Zero and negative values are rejected.
 */
export type Ttl = number | null;

export interface ResultTable {
  ensureSchema(): Promise<void>;
  /**
   * Create or replace the record for `key`, then publish `key` on the
   * notification channel. A reader that sees the notification can already
   * read the record.
   */
  put(key: StorageKey, payload: Uint8Array, ttl: Ttl): Promise<void>;
  /** Returns `null` when the record is absent or expired. */
  get(key: StorageKey): Promise<ResultRecord | null>;
  /**
   * Delete records that have expired. Expiry is otherwise lazy; nothing in
   * the store calls this.
   */
  purgeExpired(): Promise<number>;
}

export function validateTtl(ttl: Ttl): void {
  if (ttl === null) return;
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new RangeError(`ttl must be a positive number of milliseconds or null, got ${ttl}`);
  }
}
