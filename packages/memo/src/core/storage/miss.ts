/**
 * Private marker for absent entries while reconciling reads.
 *
 * Kept apart from the ring's caller-visible miss value so that a stored
 * `undefined` (or whatever the miss value is) is never mistaken for a miss.
 */
export const MISS: unique symbol = Symbol("miss")

export type Miss = typeof MISS
