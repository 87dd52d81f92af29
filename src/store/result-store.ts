// pattern: Imperative Shell

/**
 * Result store façade used by task-queue integrations.
 * Maps task ids to storage keys, applies the default TTL and timeout, and
 * delegates blocking reads to the retrieval coordinator.
 */

import { buildKey } from "../keys/codec.ts";
import { createResultCoordinator } from "../retrieval/coordinator.ts";
import { validateTimeout } from "../retrieval/deadline.ts";
import type { RetrievalOptions } from "../retrieval/coordinator.ts";
import type { NotificationChannel } from "../notifications/types.ts";
import type { ResultTable, Ttl } from "../table/types.ts";

export type ResultStoreOptions = {
  namespace: string;
  table: ResultTable;
  channel: NotificationChannel;
  defaultTimeout: number;
  defaultTtl: number;
  pollInterval?: number;
  /** Releases whatever backs the table, after the channel is closed. */
  onClose?: () => Promise<void>;
};

export type ResultStore = {
  readonly namespace: string;
  ensureSchema(): Promise<void>;
  /** `ttl` omitted uses the default TTL; `null` stores a result that never expires. */
  put(taskId: string, payload: Uint8Array, ttl?: Ttl): Promise<void>;
  get(taskId: string, options?: RetrievalOptions): Promise<Uint8Array>;
  /** Results in input order. Blocking reads share one deadline. */
  getMany(
    taskIds: ReadonlyArray<string>,
    options?: RetrievalOptions,
  ): Promise<Array<Uint8Array>>;
  purgeExpired(): Promise<number>;
  close(): Promise<void>;
};

export function createResultStore(options: ResultStoreOptions): ResultStore {
  const { namespace, table, channel, defaultTimeout, defaultTtl } = options;
  const coordinator = createResultCoordinator({
    table,
    channel,
    defaultTimeout,
    pollInterval: options.pollInterval,
  });
  let closing: Promise<void> | null = null;

  async function get(taskId: string, retrieval: RetrievalOptions = {}): Promise<Uint8Array> {
    const record = await coordinator.getResult(buildKey(namespace, taskId), retrieval);
    return record.payload;
  }

  async function getMany(
    taskIds: ReadonlyArray<string>,
    retrieval: RetrievalOptions = {},
  ): Promise<Array<Uint8Array>> {
    const timeout = retrieval.timeout ?? defaultTimeout;
    validateTimeout(timeout);
    const startedAt = Date.now();
    const payloads: Array<Uint8Array> = [];

    for (const taskId of taskIds) {
      const remaining = Math.max(0, timeout - (Date.now() - startedAt));
      payloads.push(await get(taskId, { ...retrieval, timeout: remaining }));
    }
    return payloads;
  }

  async function shutdown(): Promise<void> {
    await channel.close();
    await options.onClose?.();
  }

  return {
    namespace,
    ensureSchema: () => table.ensureSchema(),
    async put(taskId: string, payload: Uint8Array, ttl?: Ttl): Promise<void> {
      const key = buildKey(namespace, taskId);
      await table.put(key, payload, ttl === undefined ? defaultTtl : ttl);
    },
    get,
    getMany,
    purgeExpired: () => table.purgeExpired(),
    close(): Promise<void> {
      if (!closing) {
        closing = shutdown();
      }
      return closing;
    },
  };
}
