import type { CacheKey } from "../../ports/cache-key"
import type { Expire } from "../../ports/cache-ttl"
import type {
  AsyncStorageAdapter,
  NotFound,
  SyncStorageAdapter,
} from "../../ports/storage-adapter"

/**
 * Presents a sync adapter through the async verb set. Semantics are
 * unchanged; thrown errors become rejections.
 */
export class LiftedStorage implements AsyncStorageAdapter {
  readonly flavor = "async"
  readonly name: string
  readonly refactorKey?: (key: CacheKey) => CacheKey

  constructor(readonly inner: SyncStorageAdapter) {
    this.name = inner.name

    const refactor = inner.refactorKey?.bind(inner)
    if (refactor) this.refactorKey = refactor
  }

  async getValue(key: CacheKey): Promise<Uint8Array> {
    return this.inner.getValue(key)
  }

  async setValue(key: CacheKey, value: Uint8Array, expire: Expire): Promise<void> {
    this.inner.setValue(key, value, expire)
  }

  async deleteValue(key: CacheKey): Promise<void> {
    this.inner.deleteValue(key)
  }

  async hasValue(key: CacheKey): Promise<boolean> {
    return this.inner.hasValue(key)
  }

  async touchValue(key: CacheKey, expire: Expire): Promise<void> {
    this.inner.touchValue(key, expire)
  }

  async getManyValues(keys: readonly CacheKey[]): Promise<(Uint8Array | NotFound)[]> {
    return this.inner.getManyValues(keys)
  }

  async setManyValues(
    keys: readonly CacheKey[],
    values: readonly Uint8Array[],
    expire: Expire,
  ): Promise<void> {
    this.inner.setManyValues(keys, values, expire)
  }

  async deleteManyValues(keys: readonly CacheKey[]): Promise<void> {
    this.inner.deleteManyValues(keys)
  }

  async hasManyValues(keys: readonly CacheKey[]): Promise<boolean[]> {
    return this.inner.hasManyValues(keys)
  }

  async touchManyValues(keys: readonly CacheKey[], expire: Expire): Promise<void> {
    this.inner.touchManyValues(keys, expire)
  }
}

export function liftStorage(storage: SyncStorageAdapter): AsyncStorageAdapter {
  return new LiftedStorage(storage)
}
