// pattern: Imperative Shell

import { resultTimeout, waitCancelled } from "../errors.ts";
import type { ResultStoreError } from "../errors.ts";

/** Longest delay a Node.js timer honours; larger values fire after 1ms. */
export const MAX_TIMEOUT = 2_147_483_647;

export function validateTimeout(timeout: number): void {
  if (!Number.isFinite(timeout) || timeout < 0 || timeout > MAX_TIMEOUT) {
    throw new RangeError(
      `timeout must be between 0 and ${MAX_TIMEOUT} milliseconds, got ${timeout}`,
    );
  }
}

export type Deadline = {
  /** Aborted once the deadline passes or the caller cancels. */
  readonly signal: AbortSignal;
  /** Resolves when `signal` aborts. Never rejects. */
  readonly stopped: Promise<void>;
  /** Why waiting stopped, or `null` while it may continue. */
  reason(): ResultStoreError | null;
  dispose(): void;
};

export function startDeadline(
  key: string,
  timeout: number,
  signal?: AbortSignal,
): Deadline {
  const controller = new AbortController();
  let reason: ResultStoreError | null = null;

  const stop = (why: ResultStoreError): void => {
    if (reason) return;
    reason = why;
    controller.abort(why);
  };

  const timer = setTimeout(() => stop(resultTimeout(key, timeout)), timeout);
  const onCancel = (): void => stop(waitCancelled(key));

  if (signal?.aborted) {
    onCancel();
  } else {
    signal?.addEventListener("abort", onCancel, { once: true });
  }

  const stopped = new Promise<void>((resolve) => {
    if (controller.signal.aborted) {
      resolve();
      return;
    }
    controller.signal.addEventListener("abort", () => resolve(), { once: true });
  });

  return {
    signal: controller.signal,
    stopped,
    reason: () => reason,
    dispose(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCancel);
      // ends poll sleeps still pending on this deadline
      controller.abort();
    },
  };
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
