export {
  createConfigSources,
  type LoadAppConfigOptions,
  loadAppConfig,
  loadRawConfig,
  mapEnvToConfig,
} from "./load-app-config"
export { type AppConfig, type EnvConfig, envSchema } from "./schema"
