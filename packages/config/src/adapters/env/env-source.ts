import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only read keys with this prefix, and strip it. */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * Reads environment variables. Empty strings count as unset, so
 * `GCP_PROJECT_ID=` falls back to an earlier source or the schema default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue
      if (value === undefined || value === "") continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
