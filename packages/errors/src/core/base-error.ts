import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  /** Defaults to `true`. */
  isOperational?: boolean
}>

/**
 * Root of every error the packages throw. `name` follows the subclass, so
 * `new NotFoundError(...)` logs as `NotFoundError` with its code alongside.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(message: string, { code, context, cause, isOperational = true }: BaseErrorOptions<C>) {
    super(message, { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isOperational = isOperational

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
