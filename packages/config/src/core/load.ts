import { type $ZodType, prettifyError } from "zod/v4/core"
import { z } from "zod/mini"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: $ZodType<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Merge sources in order, validate against `schema` and record provenance.
 *
 * @throws {ConfigError} listing every failing key
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Config<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      key: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw new ConfigError(issues, prettifyError(result.error))
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
