// pattern: Functional Core

/**
 * Converts task results to and from the opaque bytes the store keeps.
 */
export type Encoder = {
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/** UTF-8 JSON. `undefined` is stored as `null`. */
export function createJsonEncoder(): Encoder {
  return {
    encode(value: unknown): Uint8Array {
      return textEncoder.encode(JSON.stringify(value ?? null));
    },
    decode(bytes: Uint8Array): unknown {
      return JSON.parse(textDecoder.decode(bytes));
    },
  };
}
