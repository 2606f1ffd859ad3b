import type { ConfigKey, ConfigKeyPart } from "../ports/config-key"

const ABSENT = ""

function normalize(part: ConfigKeyPart): string | number | boolean {
  return part === undefined || part === null ? ABSENT : part
}

/**
 * Encode identity fields as a JSON array, so that values containing any
 * delimiter cannot collide.
 *
 * @example
 * ```ts
 * configKey(["vertex", undefined, "us-central1"]) === configKey(["vertex", "", "us-central1"])
 * // => true, both are '["vertex","","us-central1"]'
 * ```
 */
export function configKey(parts: readonly ConfigKeyPart[]): ConfigKey {
  return JSON.stringify(parts.map(normalize))
}
