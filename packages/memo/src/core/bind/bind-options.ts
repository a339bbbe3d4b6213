import type { Logger } from "@halyard/logger"
import type { KeywordArgs } from "../../ports/arguments"
import type { Expire } from "../../ports/cache-ttl"
import type { Codec } from "../../ports/codec"
import type { AnyStorageAdapter } from "../../ports/storage-adapter"

type CommonBindOptions<R, M> = {
  /**
   * Any adapter. Flavors are checked when the ring is built, not by the
   * compiler, so untyped callers get the same errors.
   */
  storage: AnyStorageAdapter

  /** Defaults to JSON through superjson. */
  coder?: Codec<R>

  /** Defaults to the function's name, or `"anonymous"`. */
  keyPrefix?: string | null

  /** Expiry for every write and touch. `null` or omitted: persistent. */
  expire?: Expire

  /** Parameter names in declaration order; enables keyword input. */
  params?: readonly string[]

  defaults?: KeywordArgs

  /** Parameters left out of the key but still passed to the function. */
  ignorableKeys?: readonly string[]

  /** Returned by `get` / `getMany` for absent entries. Defaults to `undefined`. */
  missValue?: M

  /** Adds the bulk verbs (`getMany`, `getOrUpdateMany`, ...). */
  bulk?: boolean

  logger?: Logger
}

export type SyncBindOptions<A extends unknown[], R, M> = CommonBindOptions<R, M> & {
  flavor: "sync"
  fn: (...args: A) => R
}

export type AsyncBindOptions<A extends unknown[], R, M> = CommonBindOptions<R, M> & {
  flavor: "async"
  fn: (...args: A) => Promise<R>

  /**
   * Accept a sync adapter for this async ring. Storage calls then run inline
   * on the event loop.
   */
  forceFlavor?: boolean

  /** Share one computation between concurrent `getOrUpdate` misses per key. */
  singleflight?: boolean
}

export type BindOptions<A extends unknown[], R, M> =
  | SyncBindOptions<A, R, M>
  | AsyncBindOptions<A, R, M>
