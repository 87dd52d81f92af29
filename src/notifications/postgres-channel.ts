// pattern: Imperative Shell

/**
 * LISTEN/NOTIFY notification channel.
 * All subscriptions of one channel share a single dedicated listener
 * connection, opened on the first subscribe. When that connection fails every
 * live subscription ends with `channel_connection_lost`; the next subscribe
 * opens a fresh connection. Notifications sent while no connection was
 * listening are gone.
 */

import { ResultStoreError, isResultStoreError } from "../errors.ts";
import { createSubscriptionQueue } from "./queue.ts";
import type { SubscriptionQueue } from "./queue.ts";
import type { NotificationChannel } from "./types.ts";
import type {
  ListenerConnection,
  ListenerHandlers,
  PersistenceProvider,
  QueryFunction,
} from "../persistence/types.ts";

export type PostgresNotificationChannelOptions = {
  name: string;
  capacity: number;
};

type ActiveListener = {
  generation: number;
  connection: Promise<ListenerConnection>;
};

function channelLost(error: unknown): ResultStoreError {
  if (isResultStoreError(error, "channel_connection_lost")) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ResultStoreError(
    "channel_connection_lost",
    true,
    `notification listener lost: ${message}`,
    { cause: error },
  );
}

export function createPostgresNotificationChannel(
  persistence: PersistenceProvider,
  options: PostgresNotificationChannelOptions,
): NotificationChannel {
  const { name, capacity } = options;
  const subscribers = new Set<SubscriptionQueue>();
  let listener: ActiveListener | null = null;
  let generation = 0;
  let closed = false;

  function handlersFor(owner: number): ListenerHandlers {
    return {
      onNotification(channel: string, payload: string): void {
        if (owner !== generation || channel !== name) return;
        for (const subscriber of subscribers) {
          subscriber.push({ channel, payload });
        }
      },
      onError(error: Error): void {
        if (owner !== generation) return;
        console.error(`[notifications] listener on "${name}" lost:`, error.message);
        listener = null;
        generation++;
        const failure = channelLost(error);
        for (const subscriber of [...subscribers]) {
          subscriber.end(failure);
        }
      },
    };
  }

  async function openListener(owner: number): Promise<ListenerConnection> {
    let connection: ListenerConnection;
    try {
      connection = await persistence.openListenerConnection(handlersFor(owner));
    } catch (error) {
      throw channelLost(error);
    }
    try {
      await connection.listen(name);
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        console.error(`[notifications] closing failed listener on "${name}":`, closeError);
      });
      throw channelLost(error);
    }
    console.log(`[notifications] listening on "${name}"`);
    return connection;
  }

  function ensureListener(): ActiveListener {
    if (listener) {
      return listener;
    }
    const owner = ++generation;
    const connection = openListener(owner);
    const started: ActiveListener = { generation: owner, connection };
    listener = started;
    connection.catch(() => {
      // the subscriber that triggered the open receives the error
      if (listener === started) {
        listener = null;
      }
    });
    return started;
  }

  return {
    name,

    async publish(payload: string, query?: QueryFunction): Promise<void> {
      const run = query ?? persistence.query;
      await run("SELECT pg_notify($1, $2)", [name, payload]);
    },

    async subscribe(): Promise<SubscriptionQueue> {
      if (closed) {
        throw new Error(`notification channel "${name}" is closed`);
      }
      const active = ensureListener();
      await active.connection;
      if (listener !== active || closed) {
        throw channelLost(new Error("listener connection ended while subscribing"));
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
      const active = listener;
      listener = null;
      generation++;
      if (!active) return;
      const connection = await active.connection.catch(() => null);
      if (connection) {
        await connection.close();
      }
    },
  };
}
