/**
 * Codec defines a bidirectional transformation between a computed value `T`
 * and the bytes a storage adapter keeps.
 *
 * @remarks
 * Codecs must be pure and round-trip: `decode(encode(v))` equals `v` for every
 * value the wrapped computation may return. They may throw; rings wrap such
 * failures in `EncodingError` / `DecodingError` and surface them.
 *
 * Adapters treat codec output as opaque bytes and never import codecs.
 *
 * @example
 * ```ts
 * const upperCodec: Codec<string> = {
 *   encode: (value) => new TextEncoder().encode(value.toUpperCase()),
 *   decode: (bytes) => new TextDecoder().decode(bytes),
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
