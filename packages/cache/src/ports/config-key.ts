/**
 * Identity of a configuration, used as an instance cache key.
 *
 * Build keys with `configKey()` from a typed function that lists exactly the
 * fields that make two configurations equivalent, never by serializing the
 * whole config object.
 *
 * @example
 * ```ts
 * const keyOf = (c: ClientConfig): ConfigKey =>
 *   configKey([c.mode, c.projectId, c.location ?? "us-central1"])
 * ```
 */
export type ConfigKey = string

/** A single identity field. `undefined`, `null` and `""` are equivalent. */
export type ConfigKeyPart = string | number | boolean | null | undefined

export type KeyOf<C> = (config: C) => ConfigKey
