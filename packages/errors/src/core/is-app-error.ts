import type { AppError } from "../ports/error"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

/**
 * Whether `value` carries the `AppError` fields, whichever class built it.
 *
 * @example
 * ```ts
 * try {
 *   await users.getOrUpdateMany(argsList)
 * } catch (err) {
 *   if (isAppError(err) && err.code === "not_implemented") fallBackToSingleCalls()
 *   else throw err
 * }
 * ```
 */
export function isAppError(value: unknown): value is AppError {
  return (
    value instanceof Error &&
    "code" in value &&
    typeof value.code === "string" &&
    "context" in value &&
    isRecord(value.context) &&
    "isOperational" in value &&
    typeof value.isOperational === "boolean" &&
    "timestamp" in value &&
    value.timestamp instanceof Date
  )
}
