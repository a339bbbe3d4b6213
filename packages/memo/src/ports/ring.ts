import type { ArgsLike } from "./arguments"
import type { Binding } from "./binding"
import type { CacheKey } from "./cache-key"
import type { Effect, Flavor } from "./flavor"

/**
 * Single-item verbs of a ring.
 *
 * @remarks
 * - `get` never computes; a miss returns the binding's miss value.
 * - `update` always computes and writes.
 * - `getOrUpdate` computes at most once per call. It is not single-flight:
 *   two concurrent misses on the same key may both compute and write, and
 *   the last write wins (see the `singleflight` bind option).
 */
export interface RingVerbs<F extends Flavor, A extends unknown[], R, M> {
  readonly binding: Binding<F, R, M>

  key(...args: A): CacheKey
  execute(...args: A): Effect<F, R>
  get(...args: A): Effect<F, R | M>
  update(...args: A): Effect<F, R>
  getOrUpdate(...args: A): Effect<F, R>
  set(value: R, ...args: A): Effect<F, void>
  delete(...args: A): Effect<F, void>
  has(...args: A): Effect<F, boolean>
  touch(...args: A): Effect<F, void>
}

/**
 * Bulk verbs of a ring. Every result is aligned with `argsList`.
 *
 * @remarks
 * `getOrUpdateMany` costs one bulk read, at most one bulk write and exactly
 * one computation per missing entry.
 */
export interface BulkRingVerbs<F extends Flavor, A extends unknown[], R, M>
  extends RingVerbs<F, A, R, M> {
  keyMany(argsList: readonly ArgsLike<A>[]): CacheKey[]
  executeMany(argsList: readonly ArgsLike<A>[]): Effect<F, R[]>
  getMany(argsList: readonly ArgsLike<A>[]): Effect<F, (R | M)[]>
  updateMany(argsList: readonly ArgsLike<A>[]): Effect<F, R[]>
  getOrUpdateMany(argsList: readonly ArgsLike<A>[]): Effect<F, R[]>
  setMany(argsList: readonly ArgsLike<A>[], values: readonly R[]): Effect<F, void>
  deleteMany(argsList: readonly ArgsLike<A>[]): Effect<F, void>
  hasMany(argsList: readonly ArgsLike<A>[]): Effect<F, boolean[]>
  touchMany(argsList: readonly ArgsLike<A>[]): Effect<F, void>
}

/** A memoized function: calling it is `getOrUpdate`. */
export type Ring<F extends Flavor, A extends unknown[], R, M> = ((
  ...args: A
) => Effect<F, R>) &
  RingVerbs<F, A, R, M>

export type BulkRing<F extends Flavor, A extends unknown[], R, M> = ((
  ...args: A
) => Effect<F, R>) &
  BulkRingVerbs<F, A, R, M>
