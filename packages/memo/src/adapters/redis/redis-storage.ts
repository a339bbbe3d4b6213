import { InvalidOperationError, NotFoundError } from "../../core/errors"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl, Expire } from "../../ports/cache-ttl"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import {
  type AsyncStorageAdapter,
  NOT_FOUND,
  type NotFound,
} from "../../ports/storage-adapter"
import type { RedisBytesClient, RedisBytesMulti, RedisTtl } from "./redis-client"

export type RedisStorageOptions = {
  /**
   * Maximum number of keys sent in one command or transaction by the bulk
   * verbs. Larger requests are split into batches of this size.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

/**
 * Async adapter over node-redis. Supports every verb; bulk writes and checks
 * run in `MULTI` transactions of at most `batchSize` commands.
 *
 * Redis cannot touch a key into persistence through `EXPIRE`, so
 * `touchValue(key, null)` is rejected.
 */
export class RedisStorage implements AsyncStorageAdapter {
  readonly flavor = "async"
  readonly name = "redis"

  constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisStorageOptions = { batchSize: 1000, keyspacePrefix: "" },
  ) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${opts.batchSize}`)
    }
  }

  async getValue(key: CacheKey): Promise<Uint8Array> {
    const buffer = await this.client.get(this.fullKey(key))
    if (buffer === null) throw new NotFoundError(key, this.name)

    return new Uint8Array(buffer)
  }

  async setValue(key: CacheKey, value: Uint8Array, expire: Expire): Promise<void> {
    const fullKey = this.fullKey(key)

    if (expire) {
      await this.client.set(fullKey, value, this.toRedisTtl(expire))
    } else {
      await this.client.set(fullKey, value)
    }
  }

  async deleteValue(key: CacheKey): Promise<void> {
    await this.client.del(this.fullKey(key))
  }

  async hasValue(key: CacheKey): Promise<boolean> {
    return (await this.client.exists(this.fullKey(key))) > 0
  }

  async touchValue(key: CacheKey, expire: Expire): Promise<void> {
    const ttl = this.requireTtl(expire)
    const fullKey = this.fullKey(key)

    if (ttl.kind === "seconds") await this.client.expire(fullKey, ttl.seconds)
    else if (ttl.kind === "milliseconds") await this.client.pExpire(fullKey, ttl.milliseconds)
    else await this.client.pExpireAt(fullKey, ttl.expiresAt.getTime())
  }

  async getManyValues(keys: readonly CacheKey[]): Promise<(Uint8Array | NotFound)[]> {
    const out: (Uint8Array | NotFound)[] = []

    for (const batch of this.chunks(keys)) {
      const buffers = await this.client.mGet(batch.map((k) => this.fullKey(k)))

      for (const i of batch.keys()) {
        const buffer = buffers[i]
        out.push(buffer ? new Uint8Array(buffer) : NOT_FOUND)
      }
    }

    return out
  }

  async setManyValues(
    keys: readonly CacheKey[],
    values: readonly Uint8Array[],
    expire: Expire,
  ): Promise<void> {
    if (keys.length !== values.length) {
      throw new RangeError(`Got ${keys.length} keys but ${values.length} values`)
    }

    const ttl = expire ? this.toRedisTtl(expire) : undefined
    const entries = keys.map((key, i) => ({ key, value: values[i] }))

    for (const batch of this.chunks(entries)) {
      const tx = this.client.multi()

      for (const { key, value } of batch) {
        if (value === undefined) continue

        if (ttl) tx.set(this.fullKey(key), value, ttl)
        else tx.set(this.fullKey(key), value)
      }

      await tx.exec()
    }
  }

  async deleteManyValues(keys: readonly CacheKey[]): Promise<void> {
    for (const batch of this.chunks(keys)) {
      await this.client.del(batch.map((k) => this.fullKey(k)))
    }
  }

  async hasManyValues(keys: readonly CacheKey[]): Promise<boolean[]> {
    const out: boolean[] = []

    for (const batch of this.chunks(keys)) {
      const tx = this.client.multi()
      for (const key of batch) tx.exists(this.fullKey(key))

      const replies = this.expectReplies(await tx.exec(), batch.length)
      out.push(...replies.map((reply) => typeof reply === "number" && reply > 0))
    }

    return out
  }

  async touchManyValues(keys: readonly CacheKey[], expire: Expire): Promise<void> {
    const ttl = this.requireTtl(expire)

    for (const batch of this.chunks(keys)) {
      const tx = this.client.multi()
      for (const key of batch) this.queueTouch(tx, this.fullKey(key), ttl)

      this.expectReplies(await tx.exec(), batch.length)
    }
  }

  private queueTouch(tx: RedisBytesMulti, fullKey: string, ttl: CacheTtl): void {
    if (ttl.kind === "seconds") tx.expire(fullKey, ttl.seconds)
    else if (ttl.kind === "milliseconds") tx.pExpire(fullKey, ttl.milliseconds)
    else tx.pExpireAt(fullKey, ttl.expiresAt.getTime())
  }

  private requireTtl(expire: Expire): CacheTtl {
    if (expire === null) {
      throw new InvalidOperationError("Redis cannot touch a key without an expiry", {
        adapter: this.name,
      })
    }

    return expire
  }

  private expectReplies(replies: unknown, count: number): unknown[] {
    if (!Array.isArray(replies) || replies.length !== count) {
      throw new Error(`Invariant violation: expected ${count} transaction replies`)
    }

    return replies
  }

  private *chunks<T>(items: readonly T[]): Generator<T[]> {
    for (let i = 0; i < items.length; i += this.opts.batchSize) {
      yield items.slice(i, i + this.opts.batchSize)
    }
  }

  private toRedisTtl(ttl: CacheTtl): RedisTtl {
    if (ttl.kind === "seconds") return { EX: ttl.seconds }
    if (ttl.kind === "milliseconds") return { PX: ttl.milliseconds }

    return { PXAT: ttl.expiresAt.getTime() }
  }

  private fullKey(k: CacheKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
