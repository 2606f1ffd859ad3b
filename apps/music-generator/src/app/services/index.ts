import {
  createGenerationServices,
  type GenerationServices,
} from "../../domains/generation/composition"
import { createPresetServices, type PresetServices } from "../../domains/presets/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  presets: PresetServices
  generation: GenerationServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  const presets = createPresetServices(core, infra)
  const generation = createGenerationServices(config, core, infra, presets)

  return { presets, generation }
}
