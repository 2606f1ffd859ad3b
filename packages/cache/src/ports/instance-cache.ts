import type { ConfigKey } from "./config-key"

export type InstanceFactory<C, T> = (config: C) => T | Promise<T>

/**
 * Memoizes expensive objects (API clients, connections) by configuration.
 *
 * Entries are never evicted individually; they live until `clear()`.
 */
export interface InstanceCache<C, T> {
  /**
   * Return the instance for `config`, constructing it on a miss.
   *
   * Concurrent misses for the same key share one construction. A factory
   * failure rejects every waiter and leaves nothing cached.
   */
  getOrCreate(config: C): Promise<T>

  /** Whether an instance is cached for `config`. Never constructs. */
  has(config: C): boolean

  /**
   * Drop every cached instance. Constructions still running are returned to
   * their callers but not cached.
   */
  clear(): void

  readonly size: number

  /** Keys currently cached, in insertion order. */
  keys(): ConfigKey[]
}
