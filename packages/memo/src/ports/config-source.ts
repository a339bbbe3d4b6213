/**
 * A source of raw configuration values.
 *
 * A ConfigSource only loads values. It does not validate, coerce or merge;
 * sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used for provenance, e.g. "env:HALYARD_" or "object:overrides".
   */
  readonly name: string

  /**
   * Load values. `undefined` for a key means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
