/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in
 * `loadConfig()`, where later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Provenance label, e.g. "env", "dotenv:.env.test", "object:cli".
   */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided" and does
   * not override earlier sources.
   */
  load(): Promise<Record<string, unknown>>
}
