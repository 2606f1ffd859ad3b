import { describeRecordStoreContract, type Note } from "../../../ports/__tests__/record-store.contract"
import { MemoryRecordStore } from "../memory-record-store"

const idOf = (note: Note) => note.id

describeRecordStoreContract("MemoryRecordStore", (initial) => new MemoryRecordStore(idOf, initial))
