import type { CacheKey } from "./cache-key"
import type { Expire } from "./cache-ttl"
import type { Codec } from "./codec"
import type { Flavor } from "./flavor"
import type { AnyStorageAdapter } from "./storage-adapter"

/** Verb families a ring exposes. */
export type Capability = "single" | "bulk"

/**
 * Binding is the immutable configuration of one ring.
 *
 * @remarks
 * Created once by `bind()`, frozen, and owned by the ring it configures.
 */
export interface Binding<F extends Flavor, R, M> {
  readonly name: string
  readonly flavor: F
  readonly keyPrefix: CacheKey
  readonly expireDefault: Expire
  readonly coder: Codec<R>
  readonly storage: AnyStorageAdapter
  readonly missValue: M
  readonly capabilities: readonly Capability[]
  readonly params: readonly string[]
  readonly ignorableKeys: readonly string[]

  /** `true` when an async computation was bound to a sync adapter on request. */
  readonly forcedFlavor: boolean

  readonly singleflight: boolean
}
