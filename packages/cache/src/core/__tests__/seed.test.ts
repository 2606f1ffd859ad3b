import { MemoryRecordStore } from "../../adapters/memory/memory-record-store"
import type { RecordStore } from "../../ports/record-store"
import { computeExistingIds, seedMissing } from "../seed"

type Preset = { name: string; genre: string }

const idOf = (p: Preset) => p.name

const defaults: Preset[] = [
  { name: "lofi", genre: "lo-fi hip hop" },
  { name: "rock", genre: "rock" },
  { name: "jazz", genre: "jazz" },
]

function countingStore(initial: Preset[] = []) {
  const store = new MemoryRecordStore(idOf, initial)
  const enumerateIds = vi.spyOn(store, "enumerateIds")
  const save = vi.spyOn(store, "save")

  return { store, enumerateIds, save }
}

describe("computeExistingIds", () => {
  it("returns every stored id from a single enumeration", async () => {
    const { store, enumerateIds } = countingStore(defaults)

    const ids = await computeExistingIds(store)

    expect([...ids]).toEqual(["lofi", "rock", "jazz"])
    expect(enumerateIds).toHaveBeenCalledTimes(1)
  })

  it("returns an empty set for an empty store", async () => {
    const { store } = countingStore()

    const ids = await computeExistingIds(store)

    expect(ids.size).toBe(0)
  })
})

describe("seedMissing", () => {
  it("saves every candidate into an empty store", async () => {
    const { store, save } = countingStore()

    const result = await seedMissing(store, defaults, idOf)

    expect(result).toEqual({ seeded: ["lofi", "rock", "jazz"], skipped: [] })
    expect(save).toHaveBeenCalledTimes(3)
  })

  it("enumerates the store once however many candidates there are", async () => {
    const { store, enumerateIds } = countingStore(defaults.slice(0, 1))

    await seedMissing(store, defaults, idOf)

    expect(enumerateIds).toHaveBeenCalledTimes(1)
  })

  it("does not overwrite a record modified between runs", async () => {
    const { store, save } = countingStore()
    await seedMissing(store, defaults, idOf)
    await store.save({ name: "rock", genre: "progressive rock" })
    save.mockClear()

    const second = await seedMissing(store, defaults, idOf)

    expect(second).toEqual({ seeded: [], skipped: ["lofi", "rock", "jazz"] })
    expect(save).not.toHaveBeenCalled()
    await expect(store.load("rock")).resolves.toEqual({ name: "rock", genre: "progressive rock" })
  })

  it("saves a repeated candidate id once", async () => {
    const { store, save } = countingStore()
    const candidates = [
      { name: "lofi", genre: "first" },
      { name: "lofi", genre: "second" },
    ]

    const result = await seedMissing(store, candidates, idOf)

    expect(result).toEqual({ seeded: ["lofi"], skipped: ["lofi"] })
    expect(save).toHaveBeenCalledTimes(1)
    await expect(store.load("lofi")).resolves.toEqual({ name: "lofi", genre: "first" })
  })

  it("propagates a save failure", async () => {
    const failure = new Error("disk full")
    const store: RecordStore<string, Preset> = {
      enumerateIds: async () => [],
      load: async () => null,
      save: async () => {
        throw failure
      },
      delete: async () => {},
    }

    await expect(seedMissing(store, defaults, idOf)).rejects.toBe(failure)
  })
})
