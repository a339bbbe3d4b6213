import type { ArgsLike, CanonicalArgs, KeywordArgs } from "../../ports/arguments"
import { InvalidArgumentsError } from "../errors"

export type SignatureOptions = {
  /**
   * Parameter names in declaration order. Without them parameters are named
   * `arg0`, `arg1`, ... and keyword input is rejected.
   */
  params?: readonly string[]
  defaults?: KeywordArgs
  /** `fn.length`: parameters before the first one with a default. */
  arity: number
}

export function isPositional<A extends unknown[]>(input: ArgsLike<A>): input is A {
  return Array.isArray(input)
}

/**
 * Normalizes the different spellings of one call.
 *
 * `f(1, "en")`, `f(1)` with `lang` defaulting to `"en"` and
 * `{ id: 1, lang: "en" }` all normalize to `Map { id => 1, lang => "en" }`.
 * Parameters that were not passed and have no default are left out of the
 * map; they render as `undefined` in keys and are not passed on invocation.
 */
export class Signature<A extends unknown[]> {
  private readonly declared: readonly string[] | undefined
  private readonly defaults: ReadonlyMap<string, unknown>
  private readonly arity: number

  constructor(options: SignatureOptions) {
    this.declared = options.params
    this.arity = options.arity
    this.defaults = new Map(Object.entries(options.defaults ?? {}))

    for (const name of this.defaults.keys()) {
      if (!this.accepts(name)) throw InvalidArgumentsError.unknownParameter(name)
    }
  }

  /** Whether `name` can appear in a call of this signature. */
  accepts(name: string): boolean {
    if (this.declared) return this.declared.includes(name)

    return /^arg\d+$/.test(name)
  }

  /** Parameter names of a normalized call, in declaration order. */
  namesOf(canonical: CanonicalArgs): readonly string[] {
    if (this.declared) return this.declared

    let count = this.arity

    for (const name of canonical.keys()) {
      count = Math.max(count, Number(name.slice("arg".length)) + 1)
    }

    return generatedNames(count)
  }

  normalize(input: ArgsLike<A>): CanonicalArgs {
    return isPositional(input) ? this.fromPositional(input) : this.fromKeywords(input)
  }

  toPositional(canonical: CanonicalArgs): A {
    const names = this.namesOf(canonical)
    let last = -1

    for (const [i, name] of names.entries()) {
      if (canonical.has(name)) last = i
    }

    const args = names.slice(0, last + 1).map((name) => canonical.get(name))

    if (!this.isCall(args)) throw InvalidArgumentsError.tooManyArguments(names.length, args.length)

    return args
  }

  private isCall(args: unknown[]): args is A {
    return this.declared === undefined || args.length <= this.declared.length
  }

  private fromPositional(args: readonly unknown[]): CanonicalArgs {
    const names = this.declared ?? generatedNames(Math.max(this.arity, args.length))

    if (args.length > names.length) {
      throw InvalidArgumentsError.tooManyArguments(names.length, args.length)
    }

    const out = new Map<string, unknown>()

    for (const [i, name] of names.entries()) {
      if (i < args.length) out.set(name, args[i])
      else if (this.defaults.has(name)) out.set(name, this.defaults.get(name))
    }

    return out
  }

  private fromKeywords(input: KeywordArgs): CanonicalArgs {
    const names = this.declared

    if (!names) throw InvalidArgumentsError.keywordsWithoutParams()

    for (const name of Object.keys(input)) {
      if (!names.includes(name)) throw InvalidArgumentsError.unknownParameter(name)
    }

    const out = new Map<string, unknown>()

    for (const [i, name] of names.entries()) {
      if (Object.hasOwn(input, name)) out.set(name, input[name])
      else if (this.defaults.has(name)) out.set(name, this.defaults.get(name))
      else if (i < this.arity) throw InvalidArgumentsError.missingArgument(name)
    }

    return out
  }
}

function generatedNames(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `arg${i}`)
}
