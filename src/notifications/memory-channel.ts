// pattern: Imperative Shell

import { createSubscriptionQueue } from "./queue.ts";
import type { SubscriptionQueue } from "./queue.ts";
import type { NotificationChannel } from "./types.ts";

export type MemoryNotificationChannelOptions = {
  name?: string;
  capacity?: number;
};

/**
 * In-process channel: `publish` reaches every live subscription before it
 * resolves. For single-process deployments and tests.
 */
export function createMemoryNotificationChannel(
  options: MemoryNotificationChannelOptions = {},
): NotificationChannel {
  const name = options.name ?? "task_results";
  const capacity = options.capacity ?? 256;
  const subscribers = new Set<SubscriptionQueue>();
  let closed = false;

  return {
    name,

    async publish(payload: string): Promise<void> {
      for (const subscriber of subscribers) {
        subscriber.push({ channel: name, payload });
      }
    },

    async subscribe(): Promise<SubscriptionQueue> {
      if (closed) {
        throw new Error(`notification channel "${name}" is closed`);
      }
      const queue = createSubscriptionQueue(capacity, () => {
        subscribers.delete(queue);
      });
      subscribers.add(queue);
      return queue;
    },

    get subscriberCount(): number {
      return subscribers.size;
    },

    async close(): Promise<void> {
      closed = true;
      for (const subscriber of [...subscribers]) {
        subscriber.end();
      }
    },
  };
}
