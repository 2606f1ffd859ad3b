import path from "node:path"
import {
  type Config,
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@tunesmith/config"
import { applyOverrides, type DeepPartial } from "@tunesmith/server"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export type LoadAppConfigOptions = {
  /** Raw values that win over every other source, e.g. CLI flags. */
  cliValues?: Record<string, string | undefined>
  overrides?: DeepPartial<AppConfig>
  cwd?: string
}

export function mapEnvToConfig(env: EnvConfig, cwd: string = process.cwd()): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
    },
    presets: {
      dir: path.resolve(cwd, env.PRESETS_DIR),
      seedOnStart: env.PRESETS_SEED_ON_START,
    },
    generation: {
      mode: env.GENERATION_MODE,
      ...(env.GCP_PROJECT_ID !== undefined && { projectId: env.GCP_PROJECT_ID }),
      location: env.GCP_LOCATION,
      model: env.GENERATION_MODEL,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      outputDir: path.resolve(cwd, env.OUTPUT_DIR),
    },
  }
}

export function createConfigSources(
  env: NodeJS.ProcessEnv,
  options: LoadAppConfigOptions = {},
): ConfigSource[] {
  const cwd = options.cwd ?? process.cwd()

  // Later sources win.
  const sources: ConfigSource[] = [new DotenvSource({ file: ".env", required: false, cwd })]

  if (env.NODE_ENV) {
    sources.push(new DotenvSource({ file: `.env.${env.NODE_ENV}`, required: false, cwd }))
  }

  sources.push(new EnvSource({ env }))

  if (options.cliValues) {
    sources.push(new ObjectSource(options.cliValues, "cli"))
  }

  return sources
}

/**
 * Validated raw keys with provenance. `config show` prints this; everything
 * else uses the nested `AppConfig` from `loadAppConfig()`.
 */
export function loadRawConfig(
  env: NodeJS.ProcessEnv,
  options: LoadAppConfigOptions = {},
): Promise<Config<EnvConfig>> {
  return loadConfig({ schema: envSchema, sources: createConfigSources(env, options) })
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  options: LoadAppConfigOptions = {},
): Promise<AppConfig> {
  const result = await loadRawConfig(env, options)
  const config = mapEnvToConfig(result.value, options.cwd)

  return options.overrides ? applyOverrides(config, options.overrides) : config
}
