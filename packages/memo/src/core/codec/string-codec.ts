import type { Codec } from "../../ports/codec"

export function createStringCodec(): Codec<string> {
  const encoder = new TextEncoder()
  const decoder = new TextDecoder("utf-8", { fatal: true })

  return {
    encode: (value) => encoder.encode(value),
    decode: (data) => decoder.decode(data),
  }
}
