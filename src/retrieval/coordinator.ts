// pattern: Imperative Shell

/**
 * Blocking result retrieval.
 *
 * A blocking read checks the table, subscribes, checks the table again, and
 * then waits for whichever comes first: a notification for the key, a poll
 * tick (when polling is enabled), the deadline, or caller cancellation.
 * Notifications are only hints; a record is returned only after a table read
 * confirms it.
 */

import { ResultStoreError, resultMissing } from "../errors.ts";
import { sleep, startDeadline, validateTimeout } from "./deadline.ts";
import type { Deadline } from "./deadline.ts";
import type { StorageKey } from "../keys/codec.ts";
import type {
  NotificationChannel,
  NotificationEvent,
  Subscription,
} from "../notifications/types.ts";
import type { ResultRecord, ResultTable } from "../table/types.ts";

export type RetrievalOptions = {
  /** Wait for the result instead of failing with `result_missing`. Defaults to false. */
  block?: boolean;
  /** Upper bound on a blocking wait, in milliseconds. */
  timeout?: number;
  /** Aborting ends a blocking wait with a `cancelled` error. */
  signal?: AbortSignal;
};

export type ResultCoordinator = {
  getResult(key: StorageKey, options?: RetrievalOptions): Promise<ResultRecord>;
};

export type ResultCoordinatorDeps = {
  table: ResultTable;
  channel: NotificationChannel;
  defaultTimeout: number;
  /** Re-read the table this often while waiting; 0 relies on notifications alone. */
  pollInterval?: number;
};

type Wakeup =
  | { kind: "stop" }
  | { kind: "poll" }
  | { kind: "event"; result: IteratorResult<NotificationEvent, undefined> }
  | { kind: "failed"; error: unknown };

/**
 * Collects wakeups from the deadline, the subscription and the poll timer.
 * Each source has at most one outstanding promise, re-armed only after its
 * wakeup was taken, so a long wait holds a fixed number of reactions.
 */
type WakeupInbox = {
  post(wakeup: Wakeup): void;
  forward(source: Promise<Wakeup>): void;
  take(): Promise<Wakeup>;
};

function createWakeupInbox(): WakeupInbox {
  const ready: Array<Wakeup> = [];
  let taker: ((wakeup: Wakeup) => void) | null = null;

  function post(wakeup: Wakeup): void {
    if (taker) {
      const deliver = taker;
      taker = null;
      deliver(wakeup);
      return;
    }
    ready.push(wakeup);
  }

  return {
    post,
    forward(source: Promise<Wakeup>): void {
      source.then(post, (error: unknown) => post({ kind: "failed", error }));
    },
    take(): Promise<Wakeup> {
      const wakeup = ready.shift();
      if (wakeup) {
        return Promise.resolve(wakeup);
      }
      return new Promise((resolve) => {
        taker = resolve;
      });
    },
  };
}

function throwIfStopped(deadline: Deadline): void {
  const reason = deadline.reason();
  if (reason) {
    throw reason;
  }
}

export function createResultCoordinator(
  deps: ResultCoordinatorDeps,
): ResultCoordinator {
  const { table, channel, defaultTimeout } = deps;
  const pollInterval = deps.pollInterval ?? 0;

  async function lookup(key: StorageKey): Promise<ResultRecord> {
    const record = await table.get(key);
    if (!record) {
      throw resultMissing(key);
    }
    return record;
  }

  /** Subscribes, giving up when the deadline passes first. */
  async function subscribeWithin(
    key: StorageKey,
    deadline: Deadline,
  ): Promise<Subscription> {
    const pending = channel.subscribe();
    const subscription = await Promise.race([
      pending,
      deadline.stopped.then(() => null),
    ]);
    if (subscription) {
      return subscription;
    }

    // the listener may still connect; release the subscription when it does
    pending
      .then((late) => late.close())
      .catch((error: unknown) => {
        console.warn(`[notifications] subscribe abandoned for ${key} failed:`, error);
      });
    throwIfStopped(deadline);
    throw new Error(`wait for ${key} stopped without a reason`);
  }

  async function waitForResult(
    key: StorageKey,
    timeout: number,
    signal?: AbortSignal,
  ): Promise<ResultRecord> {
    const deadline = startDeadline(key, timeout, signal);
    let subscription: Subscription | null = null;

    try {
      const existing = await table.get(key);
      if (existing) return existing;
      throwIfStopped(deadline);

      subscription = await subscribeWithin(key, deadline);
      const live = subscription;

      // A write that landed between the first read and the subscription
      // going live was announced to nobody; only the table knows about it.
      const written = await table.get(key);
      if (written) return written;

      const inbox = createWakeupInbox();
      const awaitEvent = (): void => {
        inbox.forward(live.next().then((result): Wakeup => ({ kind: "event", result })));
      };
      const awaitPoll = (): void => {
        inbox.forward(sleep(pollInterval, deadline.signal).then((): Wakeup => ({ kind: "poll" })));
      };

      inbox.forward(deadline.stopped.then((): Wakeup => ({ kind: "stop" })));
      awaitEvent();
      if (pollInterval > 0) {
        awaitPoll();
      }

      for (;;) {
        throwIfStopped(deadline);
        const wakeup = await inbox.take();

        if (wakeup.kind === "stop") {
          throwIfStopped(deadline);
          throw new Error(`wait for ${key} stopped without a reason`);
        }

        if (wakeup.kind === "failed") {
          throw wakeup.error;
        }

        if (wakeup.kind === "poll") {
          awaitPoll();
        } else {
          if (wakeup.result.done) {
            throw (
              live.failure ??
              new ResultStoreError(
                "channel_connection_lost",
                true,
                `notification stream on "${channel.name}" ended while waiting for ${key}`,
              )
            );
          }
          awaitEvent();
          // events dropped from a full buffer may have named this key
          const missed = live.takeOverflow();
          if (wakeup.result.value.payload !== key && !missed) continue;
        }

        // a matching notification may be stale: the row can expire before this read
        const record = await table.get(key);
        if (record) return record;
      }
    } finally {
      deadline.dispose();
      await subscription?.close();
    }
  }

  return {
    async getResult(
      key: StorageKey,
      options: RetrievalOptions = {},
    ): Promise<ResultRecord> {
      const timeout = options.timeout ?? defaultTimeout;
      validateTimeout(timeout);

      if (!options.block) {
        return lookup(key);
      }
      return waitForResult(key, timeout, options.signal);
    },
  };
}
