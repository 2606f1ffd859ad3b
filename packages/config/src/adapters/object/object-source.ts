import type { ConfigSource } from "../../ports/source"

/**
 * Explicit values, such as CLI flags or test overrides. Undefined entries
 * are skipped by `loadConfig()`, so optional flags can be passed through as-is.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    label: string = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
