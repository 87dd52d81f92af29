import { describe, it, expect, beforeEach, vi } from "vitest";
import { createResultCoordinator } from "./coordinator.ts";
import type { ResultCoordinator } from "./coordinator.ts";
import { createMemoryResultTable } from "../table/memory-table.ts";
import { createMemoryNotificationChannel } from "../notifications/memory-channel.ts";
import { createSubscriptionQueue } from "../notifications/queue.ts";
import type { SubscriptionQueue } from "../notifications/queue.ts";
import { createPostgresNotificationChannel } from "../notifications/postgres-channel.ts";
import type { NotificationChannel, Subscription } from "../notifications/types.ts";
import { createPostgresResultTable } from "../table/postgres-table.ts";
import type { ResultTable } from "../table/types.ts";
import { createFakePersistence } from "../persistence/test-helpers.ts";
import type { FakePersistence } from "../persistence/test-helpers.ts";
import type { PersistenceProvider } from "../persistence/types.ts";
import { ResultStoreError, isResultStoreError } from "../errors.ts";

const KEY = "ns:a";
const bytes = (value: string): Uint8Array => new TextEncoder().encode(value);
const text = (value: Uint8Array): string => new TextDecoder().decode(value);
const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Channel whose publishes go nowhere; tests drive its subscriptions by hand. */
function createManualChannel(): NotificationChannel & { queues: Array<SubscriptionQueue> } {
  const queues: Array<SubscriptionQueue> = [];
  return {
    name: "manual",
    queues,
    async publish(): Promise<void> {},
    async subscribe(): Promise<SubscriptionQueue> {
      const queue = createSubscriptionQueue(4);
      queues.push(queue);
      return queue;
    },
    get subscriberCount(): number {
      return queues.filter((queue) => !queue.closed).length;
    },
    async close(): Promise<void> {},
  };
}

describe("ResultCoordinator", () => {
  let clock: number;
  let channel: NotificationChannel;
  let table: ResultTable;
  let coordinator: ResultCoordinator;

  beforeEach(() => {
    clock = Date.parse("2026-01-01T00:00:00.000Z");
    channel = createMemoryNotificationChannel();
    table = createMemoryResultTable({ channel, now: () => clock });
    coordinator = createResultCoordinator({ table, channel, defaultTimeout: 1000 });
  });

  describe("non-blocking", () => {
    it("returns a present record", async () => {
      await table.put(KEY, bytes("done"), 5000);

      const record = await coordinator.getResult(KEY);

      expect(text(record.payload)).toBe("done");
    });

    it("fails with result_missing for an absent record", async () => {
      const error = await coordinator.getResult(KEY).catch((caught: unknown) => caught);

      expect(isResultStoreError(error, "result_missing")).toBe(true);
      expect(error instanceof Error ? error.message : "").toBe("result missing: ns:a");
    });

    it("fails with result_missing once the record has expired", async () => {
      await table.put(KEY, bytes("done"), 5000);
      clock += 5000;

      await expect(coordinator.getResult(KEY, { block: false })).rejects.toThrow(
        "result missing: ns:a",
      );
    });

    it("never subscribes", async () => {
      const subscribe = vi.spyOn(channel, "subscribe");

      await coordinator.getResult(KEY).catch(() => null);

      expect(subscribe).not.toHaveBeenCalled();
    });
  });

  describe("blocking", () => {
    it("returns a present record without subscribing", async () => {
      const subscribe = vi.spyOn(channel, "subscribe");
      await table.put(KEY, bytes("done"), null);

      const record = await coordinator.getResult(KEY, { block: true });

      expect(text(record.payload)).toBe("done");
      expect(subscribe).not.toHaveBeenCalled();
    });

    it("wakes up when the result is written", async () => {
      const waiting = coordinator.getResult(KEY, { block: true, timeout: 1000 });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(1));

      await table.put(KEY, bytes("later"), 5000);

      expect(text((await waiting).payload)).toBe("later");
      expect(channel.subscriberCount).toBe(0);
    });

    it("finds a result written before the subscription went live", async () => {
      let reads = 0;
      const racingTable: ResultTable = {
        ...table,
        async get(key) {
          reads++;
          if (reads === 1) {
            // the writer lands, and notifies nobody, right after the first read
            await table.put(key, bytes("raced"), 5000);
            return null;
          }
          return table.get(key);
        },
      };
      const racing = createResultCoordinator({
        table: racingTable,
        channel,
        defaultTimeout: 200,
      });

      const record = await racing.getResult(KEY, { block: true });

      expect(text(record.payload)).toBe("raced");
      expect(reads).toBe(2);
    });

    it("fails with result_timeout once the timeout elapses", async () => {
      const startedAt = Date.now();

      const error = await coordinator
        .getResult(KEY, { block: true, timeout: 50 })
        .catch((caught: unknown) => caught);

      expect(isResultStoreError(error, "result_timeout")).toBe(true);
      expect(error instanceof Error ? error.message : "").toBe(
        "timed out after 50ms waiting for result: ns:a",
      );
      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(45);
      expect(channel.subscriberCount).toBe(0);
    });

    it("uses the default timeout when none is given", async () => {
      const quick = createResultCoordinator({ table, channel, defaultTimeout: 20 });

      await expect(quick.getResult(KEY, { block: true })).rejects.toThrow(
        "timed out after 20ms waiting for result: ns:a",
      );
    });

    it("keeps waiting after a notification whose record is not there", async () => {
      const get = vi.spyOn(table, "get");
      const waiting = coordinator.getResult(KEY, { block: true, timeout: 80 });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(1));

      await channel.publish(KEY);

      await expect(waiting).rejects.toThrow("timed out after 80ms waiting for result: ns:a");
      expect(get).toHaveBeenCalledTimes(3);
    });

    it("keeps waiting when the notified record expired before it was read", async () => {
      const waiting = coordinator.getResult(KEY, { block: true, timeout: 80 });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(1));

      const writing = table.put(KEY, bytes("short-lived"), 10);
      clock += 10;
      await writing;

      const error = await waiting.catch((caught: unknown) => caught);
      expect(isResultStoreError(error, "result_timeout")).toBe(true);
    });

    it("ignores notifications for other keys", async () => {
      const get = vi.spyOn(table, "get");
      const waiting = coordinator.getResult(KEY, { block: true, timeout: 1000 });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(1));

      await table.put("ns:b", bytes("other"), 5000);
      await table.put(KEY, bytes("mine"), 5000);

      expect(text((await waiting).payload)).toBe("mine");
      expect(get.mock.calls.map(([key]) => key)).toEqual([KEY, KEY, KEY]);
    });

    it("serves every waiter on the same key", async () => {
      const first = coordinator.getResult(KEY, { block: true });
      const second = coordinator.getResult(KEY, { block: true });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(2));

      await table.put(KEY, bytes("shared"), 5000);

      const records = await Promise.all([first, second]);
      expect(records.map((record) => text(record.payload))).toEqual(["shared", "shared"]);
      expect(channel.subscriberCount).toBe(0);
    });

    it("fails with cancelled when the caller aborts", async () => {
      const controller = new AbortController();
      const waiting = coordinator.getResult(KEY, {
        block: true,
        timeout: 1000,
        signal: controller.signal,
      });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(1));

      controller.abort();

      const error = await waiting.catch((caught: unknown) => caught);
      expect(isResultStoreError(error, "cancelled")).toBe(true);
      expect(error instanceof Error ? error.message : "").toBe("wait cancelled for result: ns:a");
      expect(channel.subscriberCount).toBe(0);
    });

    it("fails with cancelled without subscribing when already aborted", async () => {
      const subscribe = vi.spyOn(channel, "subscribe");
      const controller = new AbortController();
      controller.abort();

      const error = await coordinator
        .getResult(KEY, { block: true, signal: controller.signal })
        .catch((caught: unknown) => caught);

      expect(isResultStoreError(error, "cancelled")).toBe(true);
      expect(subscribe).not.toHaveBeenCalled();
    });

    it("rejects an invalid timeout", async () => {
      await expect(coordinator.getResult(KEY, { block: true, timeout: -1 })).rejects.toThrow(
        "timeout must be between 0 and 2147483647 milliseconds, got -1",
      );
      await expect(coordinator.getResult(KEY, { block: true, timeout: Number.NaN })).rejects.toThrow(
        RangeError,
      );
      await expect(
        coordinator.getResult(KEY, { block: true, timeout: Number.POSITIVE_INFINITY }),
      ).rejects.toThrow(RangeError);
    });
    it("rejects a timeout longer than a timer can wait", async () => {
      const subscribe = vi.spyOn(channel, "subscribe");

      await expect(
        coordinator.getResult(KEY, { block: true, timeout: 3_000_000_000 }),
      ).rejects.toThrow("timeout must be between 0 and 2147483647 milliseconds, got 3000000000");
      expect(subscribe).not.toHaveBeenCalled();
    });

    it("re-reads the table when a burst overflows the subscription buffer", async () => {
      const small = createMemoryNotificationChannel({ capacity: 2 });
      const smallTable = createMemoryResultTable({ channel: small, now: () => clock });
      const waiting = createResultCoordinator({
        table: smallTable,
        channel: small,
        defaultTimeout: 1000,
      }).getResult(KEY, { block: true });
      await vi.waitFor(() => expect(small.subscriberCount).toBe(1));

      // one tick: the reader takes ns:x, then ns:y2 pushes ns:a out of the buffer
      await Promise.all([
        small.publish("ns:x"),
        smallTable.put(KEY, bytes("buried"), 5000),
        small.publish("ns:y1"),
        small.publish("ns:y2"),
      ]);

      expect(text((await waiting).payload)).toBe("buried");
    });

    it("does not hold up other keys while waiting", async () => {
      const waiting = coordinator.getResult(KEY, { block: true, timeout: 1000 });
      await vi.waitFor(() => expect(channel.subscriberCount).toBe(1));
      const startedAt = Date.now();

      await table.put("ns:b", bytes("independent"), 5000);
      const other = await coordinator.getResult("ns:b", { block: true });

      expect(text(other.payload)).toBe("independent");
      expect(Date.now() - startedAt).toBeLessThan(50);

      await table.put(KEY, bytes("mine"), 5000);
      expect(text((await waiting).payload)).toBe("mine");
    });
  });

  describe("while the listener is still connecting", () => {
    let persistence: FakePersistence;
    let release: () => void = () => {};
    let opened: Array<Subscription>;
    let connecting: ResultCoordinator;

    beforeEach(() => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      persistence = createFakePersistence();
      opened = [];
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const slowConnect: PersistenceProvider = {
        ...persistence,
        async openListenerConnection(handlers) {
          await gate;
          return persistence.openListenerConnection(handlers);
        },
      };
      const slowChannel = createPostgresNotificationChannel(slowConnect, {
        name: "task_results",
        capacity: 16,
      });
      const recording: NotificationChannel = {
        name: slowChannel.name,
        publish: (payload, query) => slowChannel.publish(payload, query),
        async subscribe(): Promise<Subscription> {
          const subscription = await slowChannel.subscribe();
          opened.push(subscription);
          return subscription;
        },
        get subscriberCount(): number {
          return slowChannel.subscriberCount;
        },
        close: () => slowChannel.close(),
      };
      connecting = createResultCoordinator({
        table: createPostgresResultTable(persistence, {
          namespace: "task_results",
          channel: recording,
        }),
        channel: recording,
        defaultTimeout: 1000,
      });
    });

    it("times out at the deadline instead of waiting for the connection", async () => {
      const startedAt = Date.now();

      const error = await connecting
        .getResult(KEY, { block: true, timeout: 50 })
        .catch((caught: unknown) => caught);

      expect(isResultStoreError(error, "result_timeout")).toBe(true);
      expect(Date.now() - startedAt).toBeLessThan(500);

      release();
      await vi.waitFor(() => expect(opened[0]?.closed).toBe(true));
      expect(persistence.listenersOpened).toBe(1);
    });

    it("stops waiting for the connection when the caller aborts", async () => {
      const controller = new AbortController();
      const waiting = connecting.getResult(KEY, {
        block: true,
        timeout: 1000,
        signal: controller.signal,
      });
      await delay(10);

      controller.abort();

      const error = await waiting.catch((caught: unknown) => caught);
      expect(isResultStoreError(error, "cancelled")).toBe(true);

      release();
      await vi.waitFor(() => expect(opened[0]?.closed).toBe(true));
    });
  });

  describe("with a failing or silent channel", () => {
    let manual: ReturnType<typeof createManualChannel>;

    beforeEach(() => {
      manual = createManualChannel();
      table = createMemoryResultTable({ channel: manual, now: () => clock });
    });

    it("surfaces a lost listener connection", async () => {
      const waiting = createResultCoordinator({ table, channel: manual, defaultTimeout: 1000 })
        .getResult(KEY, { block: true });
      await vi.waitFor(() => expect(manual.queues).toHaveLength(1));

      manual.queues[0]?.end(
        new ResultStoreError("channel_connection_lost", true, "notification listener lost: reset"),
      );

      await expect(waiting).rejects.toThrow("notification listener lost: reset");
    });

    it("reports a stream that ended without a reason as a lost channel", async () => {
      const waiting = createResultCoordinator({ table, channel: manual, defaultTimeout: 1000 })
        .getResult(KEY, { block: true });
      await vi.waitFor(() => expect(manual.queues).toHaveLength(1));

      manual.queues[0]?.end();

      const error = await waiting.catch((caught: unknown) => caught);
      expect(isResultStoreError(error, "channel_connection_lost")).toBe(true);
      expect(error instanceof Error ? error.message : "").toBe(
        'notification stream on "manual" ended while waiting for ns:a',
      );
    });

    it("times out when no notification ever arrives and polling is off", async () => {
      const waiting = createResultCoordinator({ table, channel: manual, defaultTimeout: 60 })
        .getResult(KEY, { block: true });
      await vi.waitFor(() => expect(manual.queues).toHaveLength(1));

      await table.put(KEY, bytes("unannounced"), 5000);

      const error = await waiting.catch((caught: unknown) => caught);
      expect(isResultStoreError(error, "result_timeout")).toBe(true);
    });

    it("finds an unannounced result by polling", async () => {
      const waiting = createResultCoordinator({
        table,
        channel: manual,
        defaultTimeout: 1000,
        pollInterval: 10,
      }).getResult(KEY, { block: true });
      await vi.waitFor(() => expect(manual.queues).toHaveLength(1));

      await table.put(KEY, bytes("unannounced"), 5000);

      expect(text((await waiting).payload)).toBe("unannounced");
      expect(manual.subscriberCount).toBe(0);
    });
  });
});
