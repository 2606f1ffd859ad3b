export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export type { InFlightKey, Singleflight } from "./ports/single-flight"
