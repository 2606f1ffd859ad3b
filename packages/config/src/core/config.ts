import type { ConfigEntry, IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    this.data = Object.freeze({ ...data })
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  entries(): ConfigEntry[] {
    return Object.entries(this.data).map(([key, value]) => ({
      key,
      value,
      source: this.provenance[key] ?? "default",
    }))
  }

  sourcesUsed(): string[] {
    const known = new Set(this.keys())
    const used = Object.entries(this.provenance)
      .filter(([key, source]) => known.has(key) && source !== "default")
      .map(([, source]) => source)

    return [...new Set(used)]
  }

  unknownKeys(): string[] {
    const known = new Set(this.keys())

    return [...this.providedKeys].filter((k) => !known.has(k))
  }
}
