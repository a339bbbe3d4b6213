import { InvalidArgumentsError } from "../errors"

const RESERVED = /[%:,=[\]{}]/g

/** Leading text a number, bigint or date renders with. */
const SCALAR_LEAD = /^[-+\d]/

/** Whole renderings of non-string scalars that start with a letter. */
const SCALAR_WORDS = new Set(["true", "false", "null", "undefined", "Infinity", "NaN"])

const percent = (ch: string) => `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`

/**
 * Percent-escapes the characters keys use as separators, so that
 * `f("a:b")` and `f("a", "b")` cannot produce the same key.
 */
export function escapePart(value: string): string {
  return value.replace(RESERVED, percent)
}

/**
 * Escapes a string argument. A string that reads like a number, bigint,
 * date, boolean, `null` or `undefined` rendering also has its first
 * character escaped, so `f("1")` and `f(1)` get different keys.
 */
function renderString(value: string): string {
  const escaped = escapePart(value)
  if (!SCALAR_LEAD.test(escaped) && !SCALAR_WORDS.has(escaped)) return escaped

  return percent(escaped.charAt(0)) + escaped.slice(1)
}

/**
 * Renders one argument as a key part.
 *
 * Strings are escaped; numbers and booleans use `String()`, bigints carry
 * an `n` suffix and dates use escaped ISO-8601, so no string renders the
 * same as a value of another type. Arrays and plain objects render
 * recursively, objects with sorted keys. Values with a `cacheKey(): string` method use it
 * verbatim. Everything else cannot be part of a key.
 */
export function renderPart(param: string, value: unknown): string {
  return render(param, value, new WeakSet())
}

function render(param: string, value: unknown, seen: WeakSet<object>): string {
  switch (typeof value) {
    case "string":
      return renderString(value)
    case "bigint":
      return `${value}n`
    case "number":
    case "boolean":
      return String(value)
    case "undefined":
      return "undefined"
    case "function":
    case "symbol":
      throw InvalidArgumentsError.unkeyable(param, typeof value)
    case "object":
      break
  }

  if (value === null) return "null"
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw InvalidArgumentsError.unkeyable(param, "Date with an invalid time")
    }

    return escapePart(value.toISOString())
  }

  if ("cacheKey" in value && typeof value.cacheKey === "function") {
    const key: unknown = value.cacheKey()
    if (typeof key === "string") return key

    throw InvalidArgumentsError.unkeyable(param, "cacheKey() without a string result")
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value

    return nested(param, value, seen, () =>
      `[${items.map((item) => render(param, item, seen)).join(",")}]`,
    )
  }

  if (isPlainObject(value)) {
    const record = value

    return nested(param, record, seen, () => {
      const fields = Object.keys(record)
        .sort()
        .map((k) => `${escapePart(k)}=${render(param, record[k], seen)}`)

      return `{${fields.join(",")}}`
    })
  }

  throw InvalidArgumentsError.unkeyable(param, value.constructor?.name || "object")
}

/** Renders a container; `seen` holds the containers on the current path only. */
function nested(
  param: string,
  value: object,
  seen: WeakSet<object>,
  renderContents: () => string,
): string {
  if (seen.has(value)) throw InvalidArgumentsError.unkeyable(param, "cyclic structure")

  seen.add(value)
  try {
    return renderContents()
  } finally {
    seen.delete(value)
  }
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
