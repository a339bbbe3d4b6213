import type { ArgsLike, CanonicalArgs } from "../../ports/arguments"
import type { CacheKey } from "../../ports/cache-key"
import { renderPart } from "./key-part"
import type { Signature } from "./signature"

export type KeyBuilderOptions<A extends unknown[]> = {
  signature: Signature<A>
  prefix: string
  /** Parameters passed to the computation but left out of the key. */
  ignorableKeys?: readonly string[]
  /** Backend rewrite applied after the key is built. */
  refactorKey?: (key: CacheKey) => CacheKey
}

/**
 * Derives `<prefix>:<part>:<part>...` from a call. Pure: the same prefix and
 * normalized arguments always yield the same key.
 */
export class KeyBuilder<A extends unknown[]> {
  private readonly ignorable: ReadonlySet<string>

  constructor(private readonly opts: KeyBuilderOptions<A>) {
    this.ignorable = new Set(opts.ignorableKeys)
  }

  get prefix(): string {
    return this.opts.prefix
  }

  key(input: ArgsLike<A>): CacheKey {
    return this.keyOf(this.opts.signature.normalize(input))
  }

  keyMany(inputs: readonly ArgsLike<A>[]): CacheKey[] {
    return inputs.map((input) => this.key(input))
  }

  keyOf(canonical: CanonicalArgs): CacheKey {
    let key = this.opts.prefix

    for (const name of this.opts.signature.namesOf(canonical)) {
      if (this.ignorable.has(name)) continue

      key += `:${renderPart(name, canonical.get(name))}`
    }

    return this.opts.refactorKey ? this.opts.refactorKey(key) : key
  }
}
