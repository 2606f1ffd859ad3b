import type { RecordStore } from "@tunesmith/cache"
import { createGoogleRequester } from "../../domains/generation/infra/create-generation-client"
import type { AuthorizedRequester } from "../../domains/generation/infra/vertex-lyria-client"
import { YamlPresetStore } from "../../domains/presets/infra/yaml-preset-store"
import type { Preset, PresetName } from "../../domains/presets/model/preset.model"
import type { AppConfig } from "../config"

export type InfraClients = {
  presetStore: RecordStore<PresetName, Preset>
  createAuthorizedRequester: () => Promise<AuthorizedRequester>
}

export function createDefaultInfraClients(config: AppConfig): InfraClients {
  return {
    presetStore: new YamlPresetStore({ dir: config.presets.dir }),
    createAuthorizedRequester: createGoogleRequester,
  }
}
