// pattern: Imperative Shell

/**
 * Task-level API over the byte store: encodes results, records task failures
 * in place of results, and raises a stored failure back at the reader.
 */

import { ResultFailure } from "../errors.ts";
import { createJsonEncoder } from "./encoder.ts";
import type { Encoder } from "./encoder.ts";
import type { RetrievalOptions } from "../retrieval/coordinator.ts";
import type { ResultStore } from "../store/result-store.ts";
import type { Ttl } from "../table/types.ts";

export type StoredException = {
  type: string;
  message: string;
};

export type TaskResults = {
  storeResult(taskId: string, value: unknown, ttl?: Ttl): Promise<void>;
  storeException(taskId: string, error: unknown, ttl?: Ttl): Promise<void>;
  /** Throws `ResultFailure` when the task stored an exception. */
  getResult(taskId: string, options?: RetrievalOptions): Promise<unknown>;
  getResults(
    taskIds: ReadonlyArray<string>,
    options?: RetrievalOptions,
  ): Promise<Array<unknown>>;
};

export function wrapException(error: unknown): { __task_exception__: StoredException } {
  if (error instanceof Error) {
    return { __task_exception__: { type: error.name, message: error.message } };
  }
  return { __task_exception__: { type: typeof error, message: String(error) } };
}

export function readStoredException(value: unknown): StoredException | null {
  if (typeof value !== "object" || value === null || !("__task_exception__" in value)) {
    return null;
  }
  const inner = value.__task_exception__;
  if (
    typeof inner === "object" &&
    inner !== null &&
    "type" in inner &&
    typeof inner.type === "string" &&
    "message" in inner &&
    typeof inner.message === "string"
  ) {
    return { type: inner.type, message: inner.message };
  }
  return null;
}

function unwrapResult(value: unknown): unknown {
  const exception = readStoredException(value);
  if (exception) {
    throw new ResultFailure(
      `task raised ${exception.type}: ${exception.message}`,
      exception.type,
      exception.message,
    );
  }
  return value;
}

export function createTaskResults(
  store: ResultStore,
  encoder: Encoder = createJsonEncoder(),
): TaskResults {
  return {
    async storeResult(taskId: string, value: unknown, ttl?: Ttl): Promise<void> {
      await store.put(taskId, encoder.encode(value), ttl);
    },

    async storeException(taskId: string, error: unknown, ttl?: Ttl): Promise<void> {
      await store.put(taskId, encoder.encode(wrapException(error)), ttl);
    },

    async getResult(taskId: string, options?: RetrievalOptions): Promise<unknown> {
      const payload = await store.get(taskId, options);
      return unwrapResult(encoder.decode(payload));
    },

    async getResults(
      taskIds: ReadonlyArray<string>,
      options?: RetrievalOptions,
    ): Promise<Array<unknown>> {
      const payloads = await store.getMany(taskIds, options);
      return payloads.map((payload) => unwrapResult(encoder.decode(payload)));
    },
  };
}
