import type { InFlightKey, Singleflight } from "../../ports/single-flight"

async function invoke<T>(fn: () => Promise<T>): Promise<T> {
  return fn()
}

export class MemorySingleflight<T> implements Singleflight<T> {
  private flights = new Map<InFlightKey, Promise<T>>()

  async run(key: InFlightKey, fn: () => Promise<T>): Promise<T> {
    const existing = this.flights.get(key)

    if (existing) return existing

    const flight = invoke(fn)

    this.flights.set(key, flight)

    try {
      return await flight
    } finally {
      // A forgotten flight may have been replaced by a newer one under the same key.
      if (this.flights.get(key) === flight) {
        this.flights.delete(key)
      }
    }
  }

  forget(key: InFlightKey): void {
    this.flights.delete(key)
  }

  forgetAll(): void {
    this.flights = new Map()
  }

  get size(): number {
    return this.flights.size
  }
}
