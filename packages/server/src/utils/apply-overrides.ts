export type DeepPartial<T> = {
  [P in keyof T]?: (T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]) | undefined
}

/**
 * Apply structural overrides to an object tree.
 *
 * Plain objects are merged recursively. Everything else (class instances,
 * arrays, functions) is replaced whole, so a service override swaps the
 * instance rather than patching its fields.
 */
export function applyOverrides<T extends object>(base: T, overrides: DeepPartial<T> = {}): T {
  if (!isPlainObject(base) || !isPlainObject(overrides)) return base

  // deepMerge keeps every key of `base`, replacing values only with overrides typed against T
  return deepMerge(base, overrides) as T
}

function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }

  for (const [key, overrideVal] of Object.entries(overrides)) {
    if (overrideVal === undefined) continue

    const baseVal = base[key]

    result[key] =
      isPlainObject(baseVal) && isPlainObject(overrideVal)
        ? deepMerge(baseVal, overrideVal)
        : overrideVal
  }

  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  if (Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
