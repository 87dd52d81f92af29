// pattern: Functional Core

/**
 * Storage key derivation.
 * A key is `<namespace>:<task id>`; namespaces are SQL identifiers and never
 * contain `:`, so distinct (namespace, task id) pairs map to distinct keys.
 */

import { createHash } from "node:crypto";
import { ResultStoreError } from "../errors.ts";

export type StorageKey = string;

/** Longest key the result table accepts, in characters (`VARCHAR(256)`). */
export const MAX_KEY_LENGTH = 256;

const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type MessageIdentity = {
  readonly queueName: string;
  readonly actorName: string;
  readonly messageId: string;
};

export function isValidNamespace(namespace: string): boolean {
  return namespace.length <= 63 && NAMESPACE_PATTERN.test(namespace);
}

export function buildKey(namespace: string, taskId: string): StorageKey {
  if (!isValidNamespace(namespace)) {
    throw new RangeError(`invalid namespace: ${JSON.stringify(namespace)}`);
  }
  if (taskId.length === 0) {
    throw new RangeError("task id must not be empty");
  }

  const key = `${namespace}:${taskId}`;
  // Postgres measures VARCHAR length in code points, not UTF-16 units
  const length = Array.from(key).length;
  if (length > MAX_KEY_LENGTH) {
    throw new ResultStoreError(
      "key_too_long",
      false,
      `storage key is ${length} characters, limit is ${MAX_KEY_LENGTH}`,
    );
  }
  return key;
}

export function buildDigestKey(namespace: string, taskId: string): StorageKey {
  const digest = createHash("sha256").update(taskId, "utf8").digest("hex");
  return buildKey(namespace, digest);
}

export function buildMessageKey(
  namespace: string,
  message: MessageIdentity,
): StorageKey {
  return buildDigestKey(
    namespace,
    JSON.stringify([message.queueName, message.actorName, message.messageId]),
  );
}
