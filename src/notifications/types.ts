// pattern: Functional Core

import type { ResultStoreError } from "../errors.ts";
import type { QueryFunction } from "../persistence/types.ts";

/** Ephemeral; delivered only to subscriptions live at publish time. */
export type NotificationEvent = {
  readonly channel: string;
  readonly payload: string;
};

export type Subscription = AsyncIterable<NotificationEvent> & {
  /** Resolves `done` once the subscription is closed or its connection is lost. Never rejects. */
  next(): Promise<IteratorResult<NotificationEvent, undefined>>;
  /**
   * True when buffered events were dropped since the last call. A reader
   * waiting for a particular payload must then assume it was among them.
   */
  takeOverflow(): boolean;
  close(): Promise<void>;
  readonly closed: boolean;
  /** Set when the stream ended because the listener connection was lost. */
  readonly failure: ResultStoreError | null;
};

export interface NotificationChannel {
  readonly name: string;
  /**
   * Best effort: dropped when nobody is listening. Pass the query function of
   * an open transaction to deliver the notification only when it commits.
   */
  publish(payload: string, query?: QueryFunction): Promise<void>;
  subscribe(): Promise<Subscription>;
  readonly subscriberCount: number;
  close(): Promise<void>;
}
