import { NotFoundError } from "../../core/errors"
import { liftStorage } from "../../core/storage/lift-storage"
import { type Clock, SystemClock, toDeadlineMs } from "../../core/time/clock"
import type { CacheKey } from "../../ports/cache-key"
import type { Expire } from "../../ports/cache-ttl"
import {
  type AsyncStorageAdapter,
  NOT_FOUND,
  type NotFound,
  type SyncStorageAdapter,
} from "../../ports/storage-adapter"
import type { Milliseconds } from "../../ports/time"

export type MemoryStorageOptions = {
  /**
   * Upper bound on stored entries. When a write would exceed it, the oldest
   * inserted entries are dropped first. Unbounded when omitted.
   */
  maxEntries?: number
}

export type MemoryStorageDeps = {
  clock: Clock
}

type MemoryEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * Sync adapter over an in-process `Map`. Supports every verb.
 *
 * Expired entries read as absent and are dropped when seen. Values are
 * copied on the way in and out, so callers never share a buffer with storage.
 */
export class MemoryStorage implements SyncStorageAdapter {
  readonly flavor = "sync"
  readonly name = "memory"

  private readonly entries = new Map<CacheKey, MemoryEntry>()

  constructor(
    private readonly deps: MemoryStorageDeps = { clock: new SystemClock() },
    private readonly opts: MemoryStorageOptions = {},
  ) {
    if (opts.maxEntries !== undefined && opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be at least 1, got ${opts.maxEntries}`)
    }
  }

  get size(): number {
    return this.entries.size
  }

  getValue(key: CacheKey): Uint8Array {
    const entry = this.live(key)
    if (!entry) throw new NotFoundError(key, this.name)

    return Uint8Array.from(entry.value)
  }

  setValue(key: CacheKey, value: Uint8Array, expire: Expire): void {
    this.ensureCapacityFor(key)
    this.entries.set(key, this.createEntry(value, expire))
  }

  deleteValue(key: CacheKey): void {
    this.entries.delete(key)
  }

  hasValue(key: CacheKey): boolean {
    return this.live(key) !== undefined
  }

  /** Resets the expiry of a live entry; `null` makes it persistent. Absent keys are ignored. */
  touchValue(key: CacheKey, expire: Expire): void {
    const entry = this.live(key)
    if (!entry) return

    this.entries.set(key, this.createEntry(entry.value, expire))
  }

  getManyValues(keys: readonly CacheKey[]): (Uint8Array | NotFound)[] {
    return keys.map((key) => {
      const entry = this.live(key)

      return entry ? Uint8Array.from(entry.value) : NOT_FOUND
    })
  }

  setManyValues(
    keys: readonly CacheKey[],
    values: readonly Uint8Array[],
    expire: Expire,
  ): void {
    if (keys.length !== values.length) {
      throw new RangeError(`Got ${keys.length} keys but ${values.length} values`)
    }

    for (const [i, value] of values.entries()) {
      const key = keys[i]
      if (key !== undefined) this.setValue(key, value, expire)
    }
  }

  deleteManyValues(keys: readonly CacheKey[]): void {
    for (const key of keys) this.deleteValue(key)
  }

  hasManyValues(keys: readonly CacheKey[]): boolean[] {
    return keys.map((key) => this.hasValue(key))
  }

  touchManyValues(keys: readonly CacheKey[], expire: Expire): void {
    for (const key of keys) this.touchValue(key, expire)
  }

  private live(key: CacheKey): MemoryEntry | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  private createEntry(value: Uint8Array, expire: Expire): MemoryEntry {
    const expiresAtMs = toDeadlineMs(expire, this.deps.clock.nowMs())
    const copy = Uint8Array.from(value)

    return expiresAtMs === undefined ? { value: copy } : { value: copy, expiresAtMs }
  }

  private ensureCapacityFor(key: CacheKey): void {
    const { maxEntries } = this.opts
    if (maxEntries === undefined || this.entries.has(key)) return

    while (this.entries.size >= maxEntries) {
      const victim = this.entries.keys().next()
      if (victim.done) return

      this.entries.delete(victim.value)
    }
  }
}

export type CreateMemoryStorageOptions = MemoryStorageOptions & {
  flavor?: "sync" | "async"
  clock?: Clock
}

export function createMemoryStorage(
  options?: CreateMemoryStorageOptions & { flavor?: "sync" },
): SyncStorageAdapter
export function createMemoryStorage(
  options: CreateMemoryStorageOptions & { flavor: "async" },
): AsyncStorageAdapter
export function createMemoryStorage(
  options: CreateMemoryStorageOptions = {},
): SyncStorageAdapter | AsyncStorageAdapter {
  const { flavor = "sync", clock = new SystemClock(), ...opts } = options
  const storage = new MemoryStorage({ clock }, opts)

  return flavor === "async" ? liftStorage(storage) : storage
}
