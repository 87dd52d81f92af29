// pattern: Imperative Shell

import type { ResultStoreError } from "../errors.ts";
import type { NotificationEvent, Subscription } from "./types.ts";

export type SubscriptionQueue = Subscription & {
  push(event: NotificationEvent): void;
  /** Ends the stream; with a `failure`, readers see why it ended. */
  end(failure?: ResultStoreError): void;
  readonly length: number;
  readonly capacity: number;
};

type Waiter = (result: IteratorResult<NotificationEvent, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Push-to-pull bridge between a listener connection and one reader.
 * Holds at most `capacity` undelivered events, dropping the oldest; a drop
 * is reported once through `takeOverflow()`.
 */
export function createSubscriptionQueue(
  capacity: number,
  onEnd?: () => void,
): SubscriptionQueue {
  const buffer: Array<NotificationEvent> = [];
  const waiters: Array<Waiter> = [];
  let closed = false;
  let failure: ResultStoreError | null = null;
  let overflowed = false;

  function end(reason?: ResultStoreError): void {
    if (closed) return;
    closed = true;
    failure = reason ?? null;
    buffer.length = 0;
    for (const waiter of waiters.splice(0)) {
      waiter(DONE);
    }
    onEnd?.();
  }

  function next(): Promise<IteratorResult<NotificationEvent, undefined>> {
    const event = buffer.shift();
    if (event) {
      return Promise.resolve({ done: false, value: event });
    }
    if (closed) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      waiters.push(resolve);
    });
  }

  const queue: SubscriptionQueue = {
    push(event: NotificationEvent): void {
      if (closed) return;
      const waiter = waiters.shift();
      if (waiter) {
        waiter({ done: false, value: event });
        return;
      }
      if (buffer.length >= capacity) {
        buffer.shift(); // drop oldest
        overflowed = true;
      }
      buffer.push(event);
    },
    end,
    next,
    takeOverflow(): boolean {
      const dropped = overflowed;
      overflowed = false;
      return dropped;
    },
    async close(): Promise<void> {
      end();
    },
    [Symbol.asyncIterator](): AsyncIterator<NotificationEvent, undefined> {
      return {
        next,
        async return(): Promise<IteratorResult<NotificationEvent, undefined>> {
          end();
          return DONE;
        },
      };
    },
    get closed(): boolean {
      return closed;
    },
    get failure(): ResultStoreError | null {
      return failure;
    },
    get length(): number {
      return buffer.length;
    },
    get capacity(): number {
      return capacity;
    },
  };

  return queue;
}
