import type { CanonicalArgs } from "../../ports/arguments"
import type { CacheKey } from "../../ports/cache-key"
import { InvalidArgumentsError } from "../errors"
import { MISS, type Miss } from "../storage/miss"

/** One call of a bulk operation after normalization. */
export type Call = {
  index: number
  canonical: CanonicalArgs
  key: CacheKey
}

/** Pairs two lists by position; their lengths must match. */
export function zipStrict<L, R>(left: readonly L[], right: readonly R[]): [L, R][] {
  if (left.length !== right.length) {
    throw InvalidArgumentsError.lengthMismatch(left.length, right.length)
  }

  const out: [L, R][] = []
  const values = right[Symbol.iterator]()

  for (const item of left) {
    const next = values.next()
    if (next.done) break

    out.push([item, next.value])
  }

  return out
}

/** Calls whose read came back absent, in input order. */
export function missingCalls<R>(calls: readonly Call[], found: readonly (R | Miss)[]): Call[] {
  return zipStrict(calls, found).flatMap(([call, value]) => (value === MISS ? [call] : []))
}

/**
 * Places computed values at the indices of their calls. Every slot must be
 * filled; hits keep their read value.
 */
export function merge<R>(
  found: readonly (R | Miss)[],
  computed: readonly (readonly [Call, R])[],
): R[] {
  const out = [...found]

  for (const [call, value] of computed) {
    out[call.index] = value
  }

  return out.map((value, i) => {
    if (value === MISS) {
      throw new Error(`Invariant violation: no value for index ${i} after reconcile`)
    }

    return value
  })
}

export function withMissValue<R, M>(found: readonly (R | Miss)[], missValue: M): (R | M)[] {
  return found.map((value) => (value === MISS ? missValue : value))
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  )
}
