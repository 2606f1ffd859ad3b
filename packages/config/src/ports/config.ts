export type ConfigEntry = {
  key: string
  value: unknown
  /** Source name, or "default" when the schema default applied */
  source: string
}

/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z._default(z.coerce.number(), 8080) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("SERVER_PORT")     // 8080
 * config.explain("SERVER_PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default". */
  explain<K extends keyof T & string>(key: K): string

  /** Every schema key with its value and source, in schema order. */
  entries(): ConfigEntry[]

  /** Distinct sources that supplied at least one schema key. */
  sourcesUsed(): string[]

  /** Keys supplied by sources that the schema does not define. */
  unknownKeys(): string[]
}
