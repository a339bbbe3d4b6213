import type { CanonicalArgs } from "../../ports/arguments"
import type { CacheKey } from "../../ports/cache-key"
import { MISS } from "../storage/miss"
import type { AsyncInterfaceDeps } from "./interface-deps"

/**
 * Single-item verbs for an async ring.
 *
 * Writes are issued only after the computation resolved; a rejected
 * computation writes nothing. Concurrent misses on one key each compute and
 * write unless the ring was bound with a single-flight group.
 */
export class AsyncCacheInterface<A extends unknown[], R, M> {
  constructor(protected readonly deps: AsyncInterfaceDeps<A, R, M>) {}

  key(...args: A): CacheKey {
    return this.deps.keys.key(args)
  }

  async execute(...args: A): Promise<R> {
    return this.deps.fn(...args)
  }

  async get(...args: A): Promise<R | M> {
    const key = this.key(...args)
    const value = await this.deps.storage.read(key)

    this.deps.logger.debug("ring read", { op: "get", key, hits: value === MISS ? 0 : 1 })

    return value === MISS ? this.deps.missValue : value
  }

  async update(...args: A): Promise<R> {
    const key = this.key(...args)
    const value = await this.deps.fn(...args)

    await this.deps.storage.write(key, value, this.deps.expire)

    return value
  }

  async getOrUpdate(...args: A): Promise<R> {
    const key = this.key(...args)
    const cached = await this.deps.storage.read(key)

    if (cached !== MISS) {
      this.deps.logger.debug("ring hit", { op: "getOrUpdate", key })
      return cached
    }

    const { flight } = this.deps

    if (flight) {
      const result = await flight.run(key, () => this.computeAndWrite(key, args))

      this.deps.logger.debug("ring miss", {
        op: "getOrUpdate",
        key,
        computed: result.isLeader ? 1 : 0,
      })

      return result.value
    }

    const value = await this.computeAndWrite(key, args)
    this.deps.logger.debug("ring miss", { op: "getOrUpdate", key, computed: 1 })

    return value
  }

  async set(value: R, ...args: A): Promise<void> {
    await this.deps.storage.write(this.key(...args), value, this.deps.expire)
  }

  async delete(...args: A): Promise<void> {
    await this.deps.storage.remove(this.key(...args))
  }

  async has(...args: A): Promise<boolean> {
    return this.deps.storage.has(this.key(...args))
  }

  async touch(...args: A): Promise<void> {
    await this.deps.storage.touch(this.key(...args), this.deps.expire)
  }

  protected async invokeCanonical(canonical: CanonicalArgs): Promise<R> {
    return this.deps.fn(...this.deps.signature.toPositional(canonical))
  }

  private async computeAndWrite(key: CacheKey, args: A): Promise<R> {
    const value = await this.deps.fn(...args)
    await this.deps.storage.write(key, value, this.deps.expire)

    return value
  }
}
