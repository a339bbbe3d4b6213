import type { ArgsLike } from "../../ports/arguments"
import type { CacheKey } from "../../ports/cache-key"
import { AsyncCacheInterface } from "./async-cache-interface"
import { type Call, merge, missingCalls, withMissValue, zipStrict } from "./reconcile"

/**
 * Bulk verbs for an async ring. Missing entries are computed concurrently;
 * results keep input order whatever order the computations settle in.
 */
export class AsyncBulkInterface<A extends unknown[], R, M> extends AsyncCacheInterface<
  A,
  R,
  M
> {
  keyMany(argsList: readonly ArgsLike<A>[]): CacheKey[] {
    return this.deps.keys.keyMany(argsList)
  }

  async executeMany(argsList: readonly ArgsLike<A>[]): Promise<R[]> {
    return Promise.all(this.calls(argsList).map((call) => this.invokeCanonical(call.canonical)))
  }

  async getMany(argsList: readonly ArgsLike<A>[]): Promise<(R | M)[]> {
    const found = await this.deps.storage.readMany(this.keyMany(argsList))

    return withMissValue(found, this.deps.missValue)
  }

  async updateMany(argsList: readonly ArgsLike<A>[]): Promise<R[]> {
    const calls = this.calls(argsList)
    const values = await Promise.all(calls.map((call) => this.invokeCanonical(call.canonical)))

    await this.deps.storage.writeMany(
      zipStrict(calls, values).map(([call, value]) => [call.key, value] as const),
      this.deps.expire,
    )
    this.deps.logger.debug("ring bulk update", {
      op: "updateMany",
      keys: calls.length,
      computed: calls.length,
    })

    return values
  }

  async getOrUpdateMany(argsList: readonly ArgsLike<A>[]): Promise<R[]> {
    const calls = this.calls(argsList)
    const found = await this.deps.storage.readMany(calls.map((call) => call.key))
    const missing = missingCalls(calls, found)

    const computed = await Promise.all(
      missing.map(async (call) => [call, await this.invokeCanonical(call.canonical)] as const),
    )

    if (computed.length > 0) {
      await this.deps.storage.writeMany(
        computed.map(([call, value]) => [call.key, value] as const),
        this.deps.expire,
      )
    }

    this.deps.logger.debug("ring bulk reconcile", {
      op: "getOrUpdateMany",
      keys: calls.length,
      hits: calls.length - missing.length,
      misses: missing.length,
      computed: computed.length,
    })

    return merge(found, computed)
  }

  async setMany(argsList: readonly ArgsLike<A>[], values: readonly R[]): Promise<void> {
    const entries = zipStrict(this.keyMany(argsList), values)

    await this.deps.storage.writeMany(entries, this.deps.expire)
  }

  async deleteMany(argsList: readonly ArgsLike<A>[]): Promise<void> {
    await this.deps.storage.removeMany(this.keyMany(argsList))
  }

  async hasMany(argsList: readonly ArgsLike<A>[]): Promise<boolean[]> {
    return this.deps.storage.hasMany(this.keyMany(argsList))
  }

  async touchMany(argsList: readonly ArgsLike<A>[]): Promise<void> {
    await this.deps.storage.touchMany(this.keyMany(argsList), this.deps.expire)
  }

  private calls(argsList: readonly ArgsLike<A>[]): Call[] {
    return argsList.map((input, index) => {
      const canonical = this.deps.signature.normalize(input)

      return { index, canonical, key: this.deps.keys.keyOf(canonical) }
    })
  }
}
