import type { CanonicalArgs } from "../../ports/arguments"
import type { CacheKey } from "../../ports/cache-key"
import { FlavorMismatchError } from "../errors"
import { MISS } from "../storage/miss"
import type { SyncInterfaceDeps } from "./interface-deps"
import { isPromiseLike } from "./reconcile"

/**
 * Single-item verbs for a sync ring over a sync adapter.
 *
 * Nothing here yields: a call runs the computation and the storage verbs to
 * completion before returning.
 */
export class SyncCacheInterface<A extends unknown[], R, M> {
  constructor(protected readonly deps: SyncInterfaceDeps<A, R, M>) {}

  key(...args: A): CacheKey {
    return this.deps.keys.key(args)
  }

  execute(...args: A): R {
    return this.invoke(args)
  }

  get(...args: A): R | M {
    const key = this.key(...args)
    const value = this.deps.storage.read(key)

    this.deps.logger.debug("ring read", { op: "get", key, hits: value === MISS ? 0 : 1 })

    return value === MISS ? this.deps.missValue : value
  }

  update(...args: A): R {
    const key = this.key(...args)
    const value = this.invoke(args)

    this.deps.storage.write(key, value, this.deps.expire)

    return value
  }

  getOrUpdate(...args: A): R {
    const key = this.key(...args)
    const cached = this.deps.storage.read(key)

    if (cached !== MISS) {
      this.deps.logger.debug("ring hit", { op: "getOrUpdate", key })
      return cached
    }

    const value = this.invoke(args)
    this.deps.storage.write(key, value, this.deps.expire)
    this.deps.logger.debug("ring miss", { op: "getOrUpdate", key, computed: 1 })

    return value
  }

  set(value: R, ...args: A): void {
    this.deps.storage.write(this.key(...args), value, this.deps.expire)
  }

  delete(...args: A): void {
    this.deps.storage.remove(this.key(...args))
  }

  has(...args: A): boolean {
    return this.deps.storage.has(this.key(...args))
  }

  touch(...args: A): void {
    this.deps.storage.touch(this.key(...args), this.deps.expire)
  }

  protected invokeCanonical(canonical: CanonicalArgs): R {
    return this.invoke(this.deps.signature.toPositional(canonical))
  }

  private invoke(args: A): R {
    const value = this.deps.fn(...args)

    if (isPromiseLike(value)) {
      void Promise.resolve(value).then(undefined, (err: unknown) => {
        this.deps.logger.warn("sync ring result rejected after flavor mismatch", { err })
      })
      throw FlavorMismatchError.unexpectedResult(this.deps.name, "sync")
    }

    return value
  }
}
