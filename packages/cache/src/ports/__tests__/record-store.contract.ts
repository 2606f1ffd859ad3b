import type { RecordStore } from "../record-store"

export type Note = { id: string; body: string }

export function describeRecordStoreContract(
  name: string,
  factory: (initial: Note[]) => RecordStore<string, Note>,
) {
  describe(`${name} (RecordStore contract)`, () => {
    it("returns null for an unknown id", async () => {
      const store = factory([])

      await expect(store.load("missing")).resolves.toBeNull()
    })

    it("enumerates initial records", async () => {
      const store = factory([
        { id: "a", body: "first" },
        { id: "b", body: "second" },
      ])

      await expect(store.enumerateIds()).resolves.toEqual(["a", "b"])
    })

    it("saves and loads a record", async () => {
      const store = factory([])

      await store.save({ id: "a", body: "hello" })

      await expect(store.load("a")).resolves.toEqual({ id: "a", body: "hello" })
      await expect(store.enumerateIds()).resolves.toEqual(["a"])
    })

    it("replaces a record saved under the same id", async () => {
      const store = factory([{ id: "a", body: "old" }])

      await store.save({ id: "a", body: "new" })

      await expect(store.load("a")).resolves.toEqual({ id: "a", body: "new" })
      await expect(store.enumerateIds()).resolves.toEqual(["a"])
    })

    it("deletes a record", async () => {
      const store = factory([{ id: "a", body: "x" }])

      await store.delete("a")

      await expect(store.load("a")).resolves.toBeNull()
      await expect(store.enumerateIds()).resolves.toEqual([])
    })

    it("treats deleting a missing id as a no-op", async () => {
      const store = factory([])

      await expect(store.delete("missing")).resolves.toBeUndefined()
    })
  })
}
