import { type InstanceCache, MemoryInstanceCache } from "@tunesmith/cache"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import type { PresetServices } from "../../presets/composition"
import { createGenerationClientFactory } from "../infra/create-generation-client"
import { clientConfigKey, type GenerationClientConfig } from "../model/client-config"
import type { MusicGenerationClient } from "../model/track.model"
import { TrackGenerator } from "../services/track-generator"

export type GenerationServices = {
  clientCache: InstanceCache<GenerationClientConfig, MusicGenerationClient>
  trackGenerator: TrackGenerator
  outputDir: string
}

export function createGenerationServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  presets: PresetServices,
): GenerationServices {
  const clientCache = new MemoryInstanceCache<GenerationClientConfig, MusicGenerationClient>({
    keyOf: clientConfigKey,
    factory: createGenerationClientFactory({
      logger: core.logger,
      timeoutMs: config.generation.timeoutMs,
      createRequester: infra.createAuthorizedRequester,
    }),
    logger: core.logger.child({ module: "client-cache" }),
  })

  const trackGenerator = new TrackGenerator({
    presets: presets.presetService,
    clients: clientCache,
    clock: core.clock,
    logger: core.logger,
    defaultClient: {
      mode: config.generation.mode,
      ...(config.generation.projectId !== undefined && {
        projectId: config.generation.projectId,
      }),
      location: config.generation.location,
      model: config.generation.model,
    },
  })

  return { clientCache, trackGenerator, outputDir: config.generation.outputDir }
}
