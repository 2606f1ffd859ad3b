import { applyOverrides, type DeepPartial } from "@tunesmith/server"
import { type AppConfig, type LoadAppConfigOptions, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes"
import { type AppServices, createDefaultDomainServices, type DomainServices } from "./services"
import { type CoreServices, type CoreServicesOptions, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  cliValues?: LoadAppConfigOptions["cliValues"]
  logFd?: CoreServicesOptions["logFd"]
  configOverrides?: DeepPartial<AppConfig>
  infraOverrides?: DeepPartial<InfraClients>
  coreOverrides?: DeepPartial<CoreServices>
  domainOverrides?: DeepPartial<DomainServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, {
    ...(options.cwd !== undefined && { cwd: options.cwd }),
    ...(options.cliValues !== undefined && { cliValues: options.cliValues }),
    ...(options.configOverrides !== undefined && { overrides: options.configOverrides }),
  })

  const baseInfra = createDefaultInfraClients(config)
  const infra = applyOverrides(baseInfra, options.infraOverrides)

  const baseCore = createCoreServices(config, {
    ...(options.logFd !== undefined && { logFd: options.logFd }),
  })
  const core = applyOverrides(baseCore, options.coreOverrides)

  const baseDomains = createDefaultDomainServices(config, infra, core)
  const domains = applyOverrides(baseDomains, options.domainOverrides)

  return {
    config,
    infra,
    services: { core, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
