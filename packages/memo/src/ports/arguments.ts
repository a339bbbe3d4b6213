/**
 * Arguments of one call spelled by parameter name.
 *
 * @example
 * ```ts
 * ring.getMany([[1, "en"], { id: 2, lang: "de" }])
 * ```
 */
export type KeywordArgs = Readonly<Record<string, unknown>>

/**
 * Arguments of one call in a bulk operation: either the positional tuple the
 * wrapped function takes, or the same values by parameter name.
 */
export type ArgsLike<A extends unknown[]> = A | KeywordArgs

/**
 * A call's arguments normalized to keyword form in declared parameter order,
 * with defaults applied. Two spellings of the same call normalize equally.
 */
export type CanonicalArgs = ReadonlyMap<string, unknown>
