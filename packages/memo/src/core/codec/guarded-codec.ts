import type { CacheKey } from "../../ports/cache-key"
import type { Codec } from "../../ports/codec"
import { DecodingError, EncodingError } from "../errors"

export function encodeValue<T>(codec: Codec<T>, key: CacheKey, value: T): Uint8Array {
  try {
    return codec.encode(value)
  } catch (err) {
    throw new EncodingError(key, err)
  }
}

export function decodeValue<T>(codec: Codec<T>, key: CacheKey, data: Uint8Array): T {
  try {
    return codec.decode(data)
  } catch (err) {
    throw new DecodingError(key, err)
  }
}
