import { createHash } from "node:crypto"

/** Longest key memcached accepts, in bytes. */
export const MAX_MEMCACHE_KEY_BYTES = 250

const PRINTABLE = /^[\x21-\x7e]+$/

/**
 * Memcached keys must be printable ASCII without spaces and shorter than 250
 * bytes. Any other key is replaced by its SHA-1 hex digest.
 */
export function toMemcacheKey(key: string): string {
  if (PRINTABLE.test(key) && key.length < MAX_MEMCACHE_KEY_BYTES) return key

  return createHash("sha1").update(key, "utf8").digest("hex")
}
