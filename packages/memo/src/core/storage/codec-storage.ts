import type { CacheKey } from "../../ports/cache-key"
import type { Expire } from "../../ports/cache-ttl"
import type { Codec } from "../../ports/codec"
import {
  type AsyncStorageAdapter,
  NOT_FOUND,
  type NotFound,
  type SyncStorageAdapter,
} from "../../ports/storage-adapter"
import { decodeValue, encodeValue } from "../codec/guarded-codec"
import { NotFoundError } from "../errors"
import { MISS, type Miss } from "./miss"

/** A key and the value to store under it. */
export type Entry<R> = readonly [key: CacheKey, value: R]

/**
 * Typed view over a bytes adapter: values go through the ring's coder on the
 * way in and out, and absent entries come back as `MISS`.
 *
 * Every value of a bulk write is encoded before the adapter is called, so an
 * encoding failure leaves storage untouched.
 */
export class SyncCodecStorage<R> {
  constructor(
    readonly storage: SyncStorageAdapter,
    private readonly coder: Codec<R>,
  ) {}

  read(key: CacheKey): R | Miss {
    let data: Uint8Array

    try {
      data = this.storage.getValue(key)
    } catch (err) {
      if (err instanceof NotFoundError) return MISS
      throw err
    }

    return decodeValue(this.coder, key, data)
  }

  write(key: CacheKey, value: R, expire: Expire): void {
    this.storage.setValue(key, encodeValue(this.coder, key, value), expire)
  }

  remove(key: CacheKey): void {
    this.storage.deleteValue(key)
  }

  has(key: CacheKey): boolean {
    return this.storage.hasValue(key)
  }

  touch(key: CacheKey, expire: Expire): void {
    this.storage.touchValue(key, expire)
  }

  readMany(keys: readonly CacheKey[]): (R | Miss)[] {
    if (keys.length === 0) return []

    return decodeAll(this.coder, keys, this.storage.getManyValues(keys))
  }

  writeMany(entries: readonly Entry<R>[], expire: Expire): void {
    if (entries.length === 0) return

    const encoded = encodeAll(this.coder, entries)
    this.storage.setManyValues(keysOf(entries), encoded, expire)
  }

  removeMany(keys: readonly CacheKey[]): void {
    if (keys.length === 0) return

    this.storage.deleteManyValues(keys)
  }

  hasMany(keys: readonly CacheKey[]): boolean[] {
    if (keys.length === 0) return []

    return this.storage.hasManyValues(keys)
  }

  touchMany(keys: readonly CacheKey[], expire: Expire): void {
    if (keys.length === 0) return

    this.storage.touchManyValues(keys, expire)
  }
}

export class AsyncCodecStorage<R> {
  constructor(
    readonly storage: AsyncStorageAdapter,
    private readonly coder: Codec<R>,
  ) {}

  async read(key: CacheKey): Promise<R | Miss> {
    let data: Uint8Array

    try {
      data = await this.storage.getValue(key)
    } catch (err) {
      if (err instanceof NotFoundError) return MISS
      throw err
    }

    return decodeValue(this.coder, key, data)
  }

  async write(key: CacheKey, value: R, expire: Expire): Promise<void> {
    await this.storage.setValue(key, encodeValue(this.coder, key, value), expire)
  }

  async remove(key: CacheKey): Promise<void> {
    await this.storage.deleteValue(key)
  }

  async has(key: CacheKey): Promise<boolean> {
    return this.storage.hasValue(key)
  }

  async touch(key: CacheKey, expire: Expire): Promise<void> {
    await this.storage.touchValue(key, expire)
  }

  async readMany(keys: readonly CacheKey[]): Promise<(R | Miss)[]> {
    if (keys.length === 0) return []

    return decodeAll(this.coder, keys, await this.storage.getManyValues(keys))
  }

  async writeMany(entries: readonly Entry<R>[], expire: Expire): Promise<void> {
    if (entries.length === 0) return

    const encoded = encodeAll(this.coder, entries)
    await this.storage.setManyValues(keysOf(entries), encoded, expire)
  }

  async removeMany(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return

    await this.storage.deleteManyValues(keys)
  }

  async hasMany(keys: readonly CacheKey[]): Promise<boolean[]> {
    if (keys.length === 0) return []

    return this.storage.hasManyValues(keys)
  }

  async touchMany(keys: readonly CacheKey[], expire: Expire): Promise<void> {
    if (keys.length === 0) return

    await this.storage.touchManyValues(keys, expire)
  }
}

function decodeAll<R>(
  coder: Codec<R>,
  keys: readonly CacheKey[],
  found: readonly (Uint8Array | NotFound)[],
): (R | Miss)[] {
  return keys.map((key, i) => {
    const data = found[i]
    if (data === undefined || data === NOT_FOUND) return MISS

    return decodeValue(coder, key, data)
  })
}

function encodeAll<R>(coder: Codec<R>, entries: readonly Entry<R>[]): Uint8Array[] {
  return entries.map(([key, value]) => encodeValue(coder, key, value))
}

function keysOf<R>(entries: readonly Entry<R>[]): CacheKey[] {
  return entries.map(([key]) => key)
}
