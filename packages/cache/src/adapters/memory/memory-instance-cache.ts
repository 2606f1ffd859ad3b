import { createNullLogger, type Logger } from "@tunesmith/logger"
import { MemorySingleflight } from "@tunesmith/singleflight"
import type { CacheResult } from "../../ports/cache-result"
import type { ConfigKey, KeyOf } from "../../ports/config-key"
import type { InstanceCache, InstanceFactory } from "../../ports/instance-cache"

export type MemoryInstanceCacheDeps<C, T> = {
  keyOf: KeyOf<C>
  factory: InstanceFactory<C, T>
  logger?: Logger
}

/**
 * In-process `InstanceCache`.
 *
 * Map reads and writes are synchronous, so on Node's event loop no caller can
 * observe a half-applied insert or clear. Only the factory call is awaited,
 * and it runs inside a per-key single flight, so concurrent misses construct
 * once. The entry is stored when the factory resolves, before the flight is
 * released.
 */
export class MemoryInstanceCache<C, T> implements InstanceCache<C, T> {
  private entries = new Map<ConfigKey, { instance: T }>()
  private generation = 0

  private readonly flights = new MemorySingleflight<T>()
  private readonly logger: Logger

  constructor(private readonly deps: MemoryInstanceCacheDeps<C, T>) {
    this.logger = deps.logger ?? createNullLogger()
  }

  async getOrCreate(config: C): Promise<T> {
    const key = this.deps.keyOf(config)
    const cached = this.lookup(key)

    if (cached.kind === "hit") {
      this.logger.trace("Instance cache hit", { key })
      return cached.value
    }

    const generation = this.generation

    return this.flights.run(key, async () => {
      this.logger.debug("Instance cache miss, constructing", { key })

      const instance = await this.deps.factory(config)

      if (generation === this.generation) {
        this.entries.set(key, { instance })
      } else {
        this.logger.debug("Instance cache cleared during construction, not storing", { key })
      }

      return instance
    })
  }

  has(config: C): boolean {
    return this.entries.has(this.deps.keyOf(config))
  }

  clear(): void {
    if (this.entries.size === 0 && this.flights.size === 0) return

    const dropped = this.entries.size

    this.entries = new Map()
    this.generation++
    this.flights.forgetAll()

    this.logger.debug("Instance cache cleared", { dropped })
  }

  get size(): number {
    return this.entries.size
  }

  keys(): ConfigKey[] {
    return [...this.entries.keys()]
  }

  private lookup(key: ConfigKey): CacheResult<T> {
    const entry = this.entries.get(key)

    return entry ? { kind: "hit", value: entry.instance } : { kind: "miss" }
  }
}
