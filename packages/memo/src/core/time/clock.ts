import type { Expire } from "../../ports/cache-ttl"
import type { Milliseconds } from "../../ports/time"

export interface Clock {
  now(): Date
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }

  now(): Date {
    return new Date()
  }
}

/** Converts an expiry into an absolute deadline, or `undefined` for persistent. */
export function toDeadlineMs(
  expire: Expire,
  nowMs: Milliseconds,
): Milliseconds | undefined {
  if (expire === null) return undefined
  if (expire.kind === "seconds") return nowMs + expire.seconds * 1000
  if (expire.kind === "milliseconds") return nowMs + expire.milliseconds

  return expire.expiresAt.getTime()
}
