import type { IdOf, RecordStore } from "../../ports/record-store"

/**
 * `RecordStore` held in a Map. Records are copied on the way in and out, so
 * callers cannot mutate stored state through a reference.
 */
export class MemoryRecordStore<Id extends string, R> implements RecordStore<Id, R> {
  private readonly records = new Map<Id, R>()

  constructor(
    private readonly idOf: IdOf<Id, R>,
    initial: Iterable<R> = [],
  ) {
    for (const record of initial) {
      this.records.set(idOf(record), structuredClone(record))
    }
  }

  async enumerateIds(): Promise<Id[]> {
    return [...this.records.keys()]
  }

  async load(id: Id): Promise<R | null> {
    const record = this.records.get(id)

    return record === undefined ? null : structuredClone(record)
  }

  async save(record: R): Promise<void> {
    this.records.set(this.idOf(record), structuredClone(record))
  }

  async delete(id: Id): Promise<void> {
    this.records.delete(id)
  }
}
