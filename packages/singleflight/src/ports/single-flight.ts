export type InFlightKey = string

/**
 * Deduplicates concurrent async work by key.
 *
 * Calls to `run()` with a key that already has a flight in progress share that
 * flight's outcome (value or error) instead of running `fn` again.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight<Client>()
 *
 * const [a, b] = await Promise.all([
 *   flights.run(key, () => connect(config)),
 *   flights.run(key, () => connect(config)),
 * ])
 *
 * a === b // one connect() call
 * ```
 */
export interface Singleflight<T> {
  /**
   * Run `fn` for `key`, or join the flight already running for it.
   *
   * A failed flight rejects every waiter with the same error and is removed,
   * so the next call starts fresh.
   */
  run(key: InFlightKey, fn: () => Promise<T>): Promise<T>

  /**
   * Detach the running flight for `key`. Its current waiters still settle with
   * its outcome; the next `run()` starts a new flight.
   */
  forget(key: InFlightKey): void

  /** Detach every running flight. */
  forgetAll(): void

  readonly size: number
}
