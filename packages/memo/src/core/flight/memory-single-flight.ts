import type { CacheKey } from "../../ports/cache-key"
import type { FlightResult, Singleflight } from "../../ports/single-flight"

type Flight<R> = {
  readonly promise: Promise<R>
  followers: number
}

/**
 * In-process `Singleflight` over a map of running flights.
 *
 * A flight is registered synchronously on the leader's call, so callers that
 * arrive in the same tick already join it. A settling flight only removes its
 * own entry: after `forget`, the flight that replaced it stays registered.
 */
export class MemorySingleflight implements Singleflight {
  private readonly flights = new Map<CacheKey, Flight<unknown>>()

  get size(): number {
    return this.flights.size
  }

  async run<R>(key: CacheKey, fn: () => Promise<R>): Promise<FlightResult<R>> {
    const joined = this.flights.get(key) as Flight<R> | undefined

    if (joined) {
      joined.followers += 1
      const value = await joined.promise

      return { value, isLeader: false, sharedWith: joined.followers, source: "inflight" }
    }

    const flight: Flight<R> = { promise: fn(), followers: 0 }
    this.flights.set(key, flight)

    try {
      const value = await flight.promise

      return { value, isLeader: true, sharedWith: flight.followers, source: "leader" }
    } finally {
      if (this.flights.get(key) === flight) this.flights.delete(key)
    }
  }

  forget(key: CacheKey): void {
    this.flights.delete(key)
  }
}
