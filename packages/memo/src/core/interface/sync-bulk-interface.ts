import type { ArgsLike } from "../../ports/arguments"
import type { CacheKey } from "../../ports/cache-key"
import { SyncCacheInterface } from "./sync-cache-interface"
import { type Call, merge, missingCalls, withMissValue, zipStrict } from "./reconcile"

/**
 * Bulk verbs for a sync ring. Computations run one after another in input
 * order; each verb issues at most one bulk read and one bulk write.
 */
export class SyncBulkInterface<A extends unknown[], R, M> extends SyncCacheInterface<A, R, M> {
  keyMany(argsList: readonly ArgsLike<A>[]): CacheKey[] {
    return this.deps.keys.keyMany(argsList)
  }

  executeMany(argsList: readonly ArgsLike<A>[]): R[] {
    return this.calls(argsList).map((call) => this.invokeCanonical(call.canonical))
  }

  getMany(argsList: readonly ArgsLike<A>[]): (R | M)[] {
    const keys = this.keyMany(argsList)

    return withMissValue(this.deps.storage.readMany(keys), this.deps.missValue)
  }

  updateMany(argsList: readonly ArgsLike<A>[]): R[] {
    const calls = this.calls(argsList)
    const values = calls.map((call) => this.invokeCanonical(call.canonical))

    this.deps.storage.writeMany(
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

  getOrUpdateMany(argsList: readonly ArgsLike<A>[]): R[] {
    const calls = this.calls(argsList)
    const found = this.deps.storage.readMany(calls.map((call) => call.key))
    const missing = missingCalls(calls, found)

    const computed = missing.map(
      (call) => [call, this.invokeCanonical(call.canonical)] as const,
    )

    if (computed.length > 0) {
      this.deps.storage.writeMany(
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

  setMany(argsList: readonly ArgsLike<A>[], values: readonly R[]): void {
    const entries = zipStrict(this.keyMany(argsList), values)

    this.deps.storage.writeMany(entries, this.deps.expire)
  }

  deleteMany(argsList: readonly ArgsLike<A>[]): void {
    this.deps.storage.removeMany(this.keyMany(argsList))
  }

  hasMany(argsList: readonly ArgsLike<A>[]): boolean[] {
    return this.deps.storage.hasMany(this.keyMany(argsList))
  }

  touchMany(argsList: readonly ArgsLike<A>[]): void {
    this.deps.storage.touchMany(this.keyMany(argsList), this.deps.expire)
  }

  private calls(argsList: readonly ArgsLike<A>[]): Call[] {
    return argsList.map((input, index) => {
      const canonical = this.deps.signature.normalize(input)

      return { index, canonical, key: this.deps.keys.keyOf(canonical) }
    })
  }
}
