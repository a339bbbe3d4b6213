import type { CacheKey } from "./cache-key"

/**
 * Where a single-flight result came from.
 * - "leader": this caller ran the function
 * - "inflight": this caller waited on a flight another caller started
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  isLeader: boolean

  /** Number of other callers that shared this result (excluding the leader) */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent work per key inside one process.
 *
 * @remarks
 * Calls to `run()` with a key whose flight is still running share its
 * outcome, including its rejection. The next call after settlement starts
 * fresh. This is not a cross-process lock.
 */
export interface Singleflight {
  run<R>(key: CacheKey, fn: () => Promise<R>): Promise<FlightResult<R>>

  /** Forget a key; current waiters still settle, the next caller starts anew. */
  forget(key: CacheKey): void

  readonly size: number
}
