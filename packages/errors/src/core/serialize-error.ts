import type { SerializedError } from "../ports/error"
import { isAppError } from "./is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Converts any thrown value to a `SerializedError`, following `cause`.
 *
 * App errors keep their code, context and operational flag. Other errors get
 * code "unknown" and count as non-operational. A thrown string becomes the
 * message; any other non-Error value is kept under `context.value`. A cause
 * chain that loops back on itself stops at the repeated error.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  return serialize(err, options, new WeakSet())
}

function serialize(err: unknown, options: SerializeOptions, seen: WeakSet<object>): SerializedError {
  if (!(err instanceof Error)) return serializeThrown(err)

  seen.add(err)

  const app = isAppError(err)
  const cause = followCause(err.cause, options, seen)

  return {
    name: err.name,
    code: app ? err.code : "unknown",
    message: err.message,
    context: app ? { ...err.context } : {},
    isOperational: app ? err.isOperational : false,
    timestamp: (app ? err.timestamp : new Date()).toISOString(),
    ...(cause && { cause }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }
}

function followCause(
  cause: unknown,
  options: SerializeOptions,
  seen: WeakSet<object>,
): SerializedError | undefined {
  if (cause === undefined) return undefined
  if (typeof cause === "object" && cause !== null && seen.has(cause)) return undefined

  return serialize(cause, options, seen)
}

function serializeThrown(value: unknown): SerializedError {
  const message = typeof value === "string" ? value : "Unknown error"

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message,
    context: typeof value === "string" ? {} : { value },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
