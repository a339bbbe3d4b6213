/**
 * CacheKey is a plain string derived from a ring's key prefix and the
 * normalized arguments of one call.
 *
 * @remarks
 * Keys are built by the key builder, never by hand at call sites:
 *
 * ```
 * <prefix> + ":" + <part> + ":" + <part> ...
 * ```
 *
 * String parts are escaped, so `getUser("a:b")` and `getUser("a", "b")` do
 * not collide, and neither do `getUser(1)` and `getUser("1")`. Values with a
 * `cacheKey()` method are trusted to keep their keys distinct. Adapters may rewrite keys that break their backend's key
 * rules (see `StorageAdapter.refactorKey`).
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.by-id:123:en"
 * ```
 */
export type CacheKey = string
