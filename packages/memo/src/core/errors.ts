import { BaseError } from "@halyard/errors"
import type { CacheKey } from "../ports/cache-key"
import type { Flavor } from "../ports/flavor"

/**
 * Thrown by `StorageAdapter.getValue` for an absent or expired key.
 *
 * Rings recover it into a miss; it never reaches callers of ring verbs.
 */
export class NotFoundError extends BaseError<"not_found"> {
  constructor(key: CacheKey, adapter: string) {
    super(`Key not found in ${adapter}: ${key}`, {
      code: "not_found",
      context: { key, adapter },
    })
  }
}

export class NotImplementedError extends BaseError<"not_implemented"> {
  private constructor(message: string, context: Record<string, unknown>) {
    super(message, { code: "not_implemented", context })
  }

  static verb(adapter: string, verb: string): NotImplementedError {
    return new NotImplementedError(`${adapter} does not support ${verb}`, {
      adapter,
      verb,
    })
  }
}

export class FlavorMismatchError extends BaseError<"flavor_mismatch"> {
  private constructor(message: string, context: Record<string, unknown>) {
    super(message, { code: "flavor_mismatch", context, isOperational: false })
  }

  static syncOverAsync(ring: string, adapter: string): FlavorMismatchError {
    return new FlavorMismatchError(
      `Ring "${ring}" is sync but ${adapter} is async; a sync call cannot wait for it`,
      { ring, adapter, fn: "sync", storage: "async" },
    )
  }

  static asyncOverSync(ring: string, adapter: string): FlavorMismatchError {
    return new FlavorMismatchError(
      `Ring "${ring}" is async but ${adapter} is sync; pass forceFlavor to run it inline`,
      { ring, adapter, fn: "async", storage: "sync" },
    )
  }

  static unexpectedResult(ring: string, declared: Flavor): FlavorMismatchError {
    return new FlavorMismatchError(
      `Ring "${ring}" is declared ${declared} but its function returned a Promise`,
      { ring, declared },
    )
  }
}

export class EncodingError extends BaseError<"encoding_error"> {
  constructor(key: CacheKey, cause: unknown) {
    super(`Failed to encode value for ${key}`, {
      code: "encoding_error",
      context: { key },
      cause,
    })
  }
}

export class DecodingError extends BaseError<"decoding_error"> {
  constructor(key: CacheKey, cause: unknown) {
    super(`Failed to decode value for ${key}`, {
      code: "decoding_error",
      context: { key },
      cause,
    })
  }
}

export class InvalidOperationError extends BaseError<"invalid_operation"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { code: "invalid_operation", context })
  }
}

export class InvalidArgumentsError extends BaseError<"invalid_arguments"> {
  private constructor(message: string, context: Record<string, unknown>) {
    super(message, { code: "invalid_arguments", context })
  }

  static unknownParameter(name: string): InvalidArgumentsError {
    return new InvalidArgumentsError(`Unknown parameter "${name}"`, { param: name })
  }

  static tooManyArguments(expected: number, received: number): InvalidArgumentsError {
    return new InvalidArgumentsError(
      `Expected at most ${expected} arguments, received ${received}`,
      { expected, received },
    )
  }

  static missingArgument(name: string): InvalidArgumentsError {
    return new InvalidArgumentsError(`Missing argument "${name}"`, { param: name })
  }

  static keywordsWithoutParams(): InvalidArgumentsError {
    return new InvalidArgumentsError(
      "Keyword arguments need declared params",
      {},
    )
  }

  static unkeyable(param: string, kind: string): InvalidArgumentsError {
    return new InvalidArgumentsError(
      `Cannot derive a key part for "${param}" from a ${kind}`,
      { param, kind },
    )
  }

  static unknownIgnorableKey(name: string): InvalidArgumentsError {
    return new InvalidArgumentsError(
      `Ignorable key "${name}" is not a parameter`,
      { param: name },
    )
  }

  static invalidExpire(kind: string, detail: string): InvalidArgumentsError {
    return new InvalidArgumentsError(`Invalid "${kind}" expiry: ${detail}`, { kind })
  }

  static lengthMismatch(args: number, values: number): InvalidArgumentsError {
    return new InvalidArgumentsError(
      `Got ${args} argument sets but ${values} values`,
      { args, values },
    )
  }
}

export class ConfigValidationError extends BaseError<"config_validation_error"> {
  constructor(readonly issues: string) {
    super(`Configuration validation failed:\n${issues}`, {
      code: "config_validation_error",
      isOperational: false,
    })
  }
}
