/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadMemoConfig()
 *
 * config.value.REDIS_BATCH_SIZE       // 1000
 * config.explain("REDIS_BATCH_SIZE")  // "default"
 * config.explain("KEY_PREFIX")        // "env:HALYARD_"
 * ```
 */
export class Config<T extends Record<string, unknown>> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  /** Name of the source that won for `key`, or "default". */
  explain(key: keyof T & string): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[] {
    const known = new Set(this.keys())

    return [...this.providedKeys].filter((k) => !known.has(k))
  }
}
