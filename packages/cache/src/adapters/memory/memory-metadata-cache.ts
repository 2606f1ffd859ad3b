import { createNullLogger, type Logger } from "@tunesmith/logger"
import { MemorySingleflight } from "@tunesmith/singleflight"
import { RecordNotFoundError } from "../../core/record-not-found-error"
import type { CacheResult } from "../../ports/cache-result"
import type { MetadataCache } from "../../ports/metadata-cache"
import type { RecordReader } from "../../ports/record-store"

export type MemoryMetadataCacheDeps<Id extends string, R, M> = {
  store: RecordReader<Id, R>
  /** Pure summary of a record. */
  derive: (record: R) => M
  logger?: Logger
}

/**
 * In-process `MetadataCache`.
 *
 * Each running load registers a token under its id. `invalidate()` and
 * `invalidateAll()` drop the tokens, and a load only caches its result while
 * its token is still registered, so a load that read the store before a write
 * cannot cache its result after it. Tokens live only as long as their load.
 */
export class MemoryMetadataCache<Id extends string, R, M> implements MetadataCache<Id, M> {
  private entries = new Map<Id, { metadata: M }>()
  private loading = new Map<Id, symbol>()

  private readonly flights = new MemorySingleflight<M | null>()
  private readonly logger: Logger

  constructor(private readonly deps: MemoryMetadataCacheDeps<Id, R, M>) {
    this.logger = deps.logger ?? createNullLogger()
  }

  async get(id: Id): Promise<M> {
    const metadata = await this.resolve(id)

    if (metadata === null) throw RecordNotFoundError.forId(id)

    return metadata
  }

  async list(): Promise<M[]> {
    const ids = await this.deps.store.enumerateIds()
    const resolved = await Promise.all(ids.map((id) => this.resolve(id)))

    return resolved.filter((m): m is Awaited<M> => m !== null)
  }

  invalidate(id: Id): void {
    this.entries.delete(id)
    this.loading.delete(id)
    this.flights.forget(id)
  }

  invalidateAll(): void {
    this.entries = new Map()
    this.loading = new Map()
    this.flights.forgetAll()
  }

  get size(): number {
    return this.entries.size
  }

  /** Loads currently registered against the store. */
  get loadsInFlight(): number {
    return this.loading.size
  }

  private async resolve(id: Id): Promise<M | null> {
    const cached = this.lookup(id)

    if (cached.kind === "hit") return cached.value

    return this.flights.run(id, () => this.load(id))
  }

  private async load(id: Id): Promise<M | null> {
    const token = Symbol(id)
    const loading = this.loading

    loading.set(id, token)

    try {
      const record = await this.deps.store.load(id)

      if (record === null) {
        this.logger.debug("Metadata load found no record", { id })
        return null
      }

      const metadata = this.deps.derive(record)

      if (this.loading.get(id) === token) {
        this.entries.set(id, { metadata })
      } else {
        this.logger.debug("Record changed during metadata load, not caching", { id })
      }

      return metadata
    } finally {
      if (loading.get(id) === token) loading.delete(id)
    }
  }

  private lookup(id: Id): CacheResult<M> {
    const entry = this.entries.get(id)

    return entry ? { kind: "hit", value: entry.metadata } : { kind: "miss" }
  }
}
