import type { IdOf, RecordStore } from "../ports/record-store"

export type SeedResult<Id extends string> = {
  seeded: Id[]
  skipped: Id[]
}

/**
 * Snapshot of the ids in `store`, taken with a single enumeration.
 */
export async function computeExistingIds<Id extends string>(
  store: Pick<RecordStore<Id, unknown>, "enumerateIds">,
): Promise<ReadonlySet<Id>> {
  return new Set(await store.enumerateIds())
}

/**
 * Save each candidate whose id is not already stored.
 *
 * Existing records are never overwritten, and a candidate id repeated in
 * `candidates` is saved once. Records created by other writers after the
 * snapshot are not detected; seeding is best-effort initialization.
 */
export async function seedMissing<Id extends string, R>(
  store: Pick<RecordStore<Id, R>, "enumerateIds" | "save">,
  candidates: Iterable<R>,
  idOf: IdOf<Id, R>,
): Promise<SeedResult<Id>> {
  const existing = await computeExistingIds(store)
  const claimed = new Set<Id>(existing)
  const result: SeedResult<Id> = { seeded: [], skipped: [] }

  for (const candidate of candidates) {
    const id = idOf(candidate)

    if (claimed.has(id)) {
      result.skipped.push(id)
      continue
    }

    claimed.add(id)
    await store.save(candidate)
    result.seeded.push(id)
  }

  return result
}
