import { NotFoundError, NotImplementedError } from "../../core/errors"
import { type Clock, SystemClock } from "../../core/time/clock"
import type { CacheKey } from "../../ports/cache-key"
import type { Expire } from "../../ports/cache-ttl"
import {
  type AsyncStorageAdapter,
  NOT_FOUND,
  type NotFound,
} from "../../ports/storage-adapter"
import type { MemcacheClient } from "./memcache-client"
import { toMemcacheKey } from "./memcache-key"

/** Relative expirations above this are read by memcached as unix timestamps. */
const MAX_RELATIVE_EXPIRE_SECONDS = 60 * 60 * 24 * 30

/**
 * Async adapter over a memcached client.
 *
 * Memcached has a multi-get but no multi-set, multi-delete or existence
 * check, so `getManyValues` is the only bulk verb and `hasValue` is not
 * supported. Keys memcached would reject are hashed (see `toMemcacheKey`).
 */
export class MemcacheStorage implements AsyncStorageAdapter {
  readonly flavor = "async"
  readonly name = "memcache"

  constructor(
    private readonly client: MemcacheClient,
    private readonly deps: { clock: Clock } = { clock: new SystemClock() },
  ) {}

  refactorKey(key: CacheKey): CacheKey {
    return toMemcacheKey(key)
  }

  async getValue(key: CacheKey): Promise<Uint8Array> {
    const { value } = await this.client.get(key)
    if (value === null) throw new NotFoundError(key, this.name)

    return new Uint8Array(value)
  }

  async setValue(key: CacheKey, value: Uint8Array, expire: Expire): Promise<void> {
    await this.client.set(key, Buffer.from(value), { expires: this.toExpires(expire) })
  }

  async deleteValue(key: CacheKey): Promise<void> {
    await this.client.delete(key)
  }

  async hasValue(_key: CacheKey): Promise<boolean> {
    throw NotImplementedError.verb(this.name, "hasValue")
  }

  async touchValue(key: CacheKey, expire: Expire): Promise<void> {
    await this.client.touch(key, this.toExpires(expire))
  }

  async getManyValues(keys: readonly CacheKey[]): Promise<(Uint8Array | NotFound)[]> {
    if (keys.length === 0) return []

    const found = await this.client.getMulti([...keys])

    return keys.map((key) => {
      const value = found[key]

      return value ? new Uint8Array(value) : NOT_FOUND
    })
  }

  async setManyValues(
    _keys: readonly CacheKey[],
    _values: readonly Uint8Array[],
    _expire: Expire,
  ): Promise<void> {
    throw NotImplementedError.verb(this.name, "setManyValues")
  }

  async deleteManyValues(_keys: readonly CacheKey[]): Promise<void> {
    throw NotImplementedError.verb(this.name, "deleteManyValues")
  }

  async hasManyValues(_keys: readonly CacheKey[]): Promise<boolean[]> {
    throw NotImplementedError.verb(this.name, "hasManyValues")
  }

  async touchManyValues(_keys: readonly CacheKey[], _expire: Expire): Promise<void> {
    throw NotImplementedError.verb(this.name, "touchManyValues")
  }

  private toExpires(expire: Expire): number {
    if (expire === null) return 0

    // memcached reads small numbers as relative seconds and 0 as "never".
    if (expire.kind === "until") {
      return Math.max(Math.ceil(expire.expiresAt.getTime() / 1000), MAX_RELATIVE_EXPIRE_SECONDS + 1)
    }

    const seconds =
      expire.kind === "seconds" ? expire.seconds : Math.ceil(expire.milliseconds / 1000)

    if (seconds <= MAX_RELATIVE_EXPIRE_SECONDS) return seconds

    return Math.ceil(this.deps.clock.nowMs() / 1000) + seconds
  }
}
