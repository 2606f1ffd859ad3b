import { type ConfigKey, configKey } from "@tunesmith/cache"

export const generationModes = ["simulate", "vertex"] as const

export type GenerationMode = (typeof generationModes)[number]

export const DEFAULT_LOCATION = "us-central1"
export const DEFAULT_MODEL = "lyria-002"

export type GenerationClientConfig = {
  mode: GenerationMode
  projectId?: string
  location?: string
  model?: string
}

export type ClientOverrides = {
  [K in keyof GenerationClientConfig]?: GenerationClientConfig[K] | undefined
}

function orDefault(value: string | undefined, fallback: string): string {
  return value === undefined || value === "" ? fallback : value
}

/**
 * Identity of a generation client. Configs that only differ by spelling out
 * the default location or model share a client.
 */
export function clientConfigKey(config: GenerationClientConfig): ConfigKey {
  return configKey([
    config.mode,
    config.projectId,
    orDefault(config.location, DEFAULT_LOCATION),
    orDefault(config.model, DEFAULT_MODEL),
  ])
}

/** Layer per-request overrides over the application default. */
export function resolveClientConfig(
  base: GenerationClientConfig,
  overrides: ClientOverrides = {},
): GenerationClientConfig {
  const projectId = overrides.projectId || base.projectId

  return {
    mode: overrides.mode ?? base.mode,
    ...(projectId && { projectId }),
    location: orDefault(overrides.location, orDefault(base.location, DEFAULT_LOCATION)),
    model: orDefault(overrides.model, orDefault(base.model, DEFAULT_MODEL)),
  }
}
