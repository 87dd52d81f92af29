// pattern: Functional Core

export type QueryFunction = <T extends Record<string, unknown>>(
  sql: string,
  params?: ReadonlyArray<unknown>,
) => Promise<Array<T>>;

export type ListenerHandlers = {
  onNotification(channel: string, payload: string): void;
  /** Called once when the connection fails or ends without `close()`. */
  onError(error: Error): void;
};

/**
 * A connection reserved for LISTEN. It never runs ordinary queries, so
 * notification delivery is not queued behind transactional work.
 */
export type ListenerConnection = {
  listen(channel: string): Promise<void>;
  close(): Promise<void>;
};

export type PersistenceProvider = {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query: QueryFunction;
  withTransaction<T>(
    fn: (query: QueryFunction) => Promise<T>,
  ): Promise<T>;
  openListenerConnection(handlers: ListenerHandlers): Promise<ListenerConnection>;
};
