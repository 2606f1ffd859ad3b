import type { MetadataInvalidator } from "../ports/metadata-cache"
import type { IdOf, RecordStore } from "../ports/record-store"

export type InvalidatingRecordStoreDeps<Id extends string, R> = {
  store: RecordStore<Id, R>
  cache: MetadataInvalidator<Id>
  idOf: IdOf<Id, R>
}

/**
 * Wraps a store so that every save and delete invalidates the cached
 * metadata for its id before the write resolves. Failed writes invalidate too.
 */
export class InvalidatingRecordStore<Id extends string, R> implements RecordStore<Id, R> {
  constructor(private readonly deps: InvalidatingRecordStoreDeps<Id, R>) {}

  enumerateIds(): Promise<Id[]> {
    return this.deps.store.enumerateIds()
  }

  load(id: Id): Promise<R | null> {
    return this.deps.store.load(id)
  }

  async save(record: R): Promise<void> {
    const id = this.deps.idOf(record)

    try {
      await this.deps.store.save(record)
    } finally {
      this.deps.cache.invalidate(id)
    }
  }

  async delete(id: Id): Promise<void> {
    try {
      await this.deps.store.delete(id)
    } finally {
      this.deps.cache.invalidate(id)
    }
  }
}
