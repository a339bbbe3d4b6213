import type { Codec } from "../../ports/codec"

/** Stores bytes as-is. Copies on both sides so callers never share buffers with storage. */
export function createBytesCodec(): Codec<Uint8Array> {
  return {
    encode: (value) => Uint8Array.from(value),
    decode: (data) => Uint8Array.from(data),
  }
}
