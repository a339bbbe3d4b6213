import type { CacheKey } from "./cache-key"
import type { Expire } from "./cache-ttl"
import type { Effect, Flavor } from "./flavor"

/**
 * Marks an absent entry in the result of a bulk read.
 */
export const NOT_FOUND: unique symbol = Symbol("halyard.not-found")

export type NotFound = typeof NOT_FOUND

/**
 * StorageAdapter is the verb set every backend exposes to the engine.
 *
 * @remarks
 * - Every verb exists in both flavors with identical semantics; `F` only
 *   decides whether results are returned directly or as Promises.
 * - `getValue` throws `NotFoundError` for an absent (or expired) key. That is
 *   the only backend outcome an adapter translates; every other backend
 *   error propagates unchanged.
 * - Bulk verbs are an optional capability. An adapter without a native
 *   multi-key command throws `NotImplementedError` without touching the
 *   backend; it never emulates the verb by iterating single-key calls.
 * - Bulk results are aligned with the input keys.
 * - `expire` of `null` means persistent. Adapters whose backend cannot touch
 *   without an expiry throw `InvalidOperationError` for `touch(null)`.
 */
export interface StorageAdapter<F extends Flavor> {
  readonly flavor: F

  /** Human-readable adapter name for errors and logs. */
  readonly name: string

  /**
   * Rewrite a derived key into one the backend accepts (e.g. hashing keys
   * that exceed a length limit). Must be pure.
   */
  refactorKey?(key: CacheKey): CacheKey

  getValue(key: CacheKey): Effect<F, Uint8Array>

  setValue(key: CacheKey, value: Uint8Array, expire: Expire): Effect<F, void>

  deleteValue(key: CacheKey): Effect<F, void>

  hasValue(key: CacheKey): Effect<F, boolean>

  touchValue(key: CacheKey, expire: Expire): Effect<F, void>

  getManyValues(keys: readonly CacheKey[]): Effect<F, (Uint8Array | NotFound)[]>

  setManyValues(
    keys: readonly CacheKey[],
    values: readonly Uint8Array[],
    expire: Expire,
  ): Effect<F, void>

  deleteManyValues(keys: readonly CacheKey[]): Effect<F, void>

  hasManyValues(keys: readonly CacheKey[]): Effect<F, boolean[]>

  touchManyValues(keys: readonly CacheKey[], expire: Expire): Effect<F, void>
}

export type SyncStorageAdapter = StorageAdapter<"sync">
export type AsyncStorageAdapter = StorageAdapter<"async">
export type AnyStorageAdapter = SyncStorageAdapter | AsyncStorageAdapter
