import superjson from "superjson"
import type { Codec } from "../../ports/codec"

const decoder = new TextDecoder()
const encoder = new TextEncoder()

/**
 * JSON through superjson, so `Date`, `Map`, `Set`, `BigInt` and `undefined`
 * survive the round trip. The default coder of a ring.
 */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(superjson.stringify(value)),
    decode: (data: Uint8Array) => superjson.parse<T>(decoder.decode(data)),
  }
}
