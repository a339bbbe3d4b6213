/**
 * Execution flavor of a computation or a storage adapter.
 *
 * - `"sync"`: every call returns its value and occupies the caller until done.
 * - `"async"`: every call returns a Promise and may yield to the event loop.
 */
export type Flavor = "sync" | "async"

/**
 * The result type of an operation under a given flavor.
 *
 * @example
 * ```ts
 * type A = Effect<"sync", number>  // number
 * type B = Effect<"async", number> // Promise<number>
 * ```
 */
export type Effect<F extends Flavor, T> = F extends "async" ? Promise<T> : T
