export type IdOf<Id extends string, R> = (record: R) => Id

export interface RecordReader<Id extends string, R> {
  /** Ids of every stored record, in a stable order. */
  enumerateIds(): Promise<Id[]>

  /** The record, or `null` when the store has none with this id. */
  load(id: Id): Promise<R | null>
}

/**
 * Persistence for whole records keyed by id.
 *
 * Errors other than "not found" (I/O, parse) propagate from every method.
 */
export interface RecordStore<Id extends string, R> extends RecordReader<Id, R> {
  /** Create or replace the record under its id. */
  save(record: R): Promise<void>

  /** Remove the record. Deleting a missing id is a no-op. */
  delete(id: Id): Promise<void>
}
