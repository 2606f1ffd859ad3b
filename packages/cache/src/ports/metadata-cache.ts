export interface MetadataInvalidator<Id extends string> {
  /**
   * Drop the entry for `id`. Loads already running for it will not be cached.
   */
  invalidate(id: Id): void

  /** Drop every entry. */
  invalidateAll(): void
}

/**
 * Memoizes summaries derived from stored records.
 *
 * The write path must call `invalidate(id)` before a save or delete of `id`
 * is reported complete; `InvalidatingRecordStore` does this.
 */
export interface MetadataCache<Id extends string, M> extends MetadataInvalidator<Id> {
  /**
   * @throws {RecordNotFoundError} when the store has no record `id`
   */
  get(id: Id): Promise<M>

  /**
   * Metadata for every record, in store enumeration order. Records removed
   * between enumeration and load are left out.
   */
  list(): Promise<M[]>

  readonly size: number
}
