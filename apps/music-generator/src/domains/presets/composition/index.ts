import {
  InvalidatingRecordStore,
  MemoryMetadataCache,
  type MetadataCache,
  type RecordStore,
} from "@tunesmith/cache"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { loadBuiltinPresets } from "../infra/builtin-presets"
import {
  type Preset,
  type PresetName,
  type PresetSummary,
  presetName,
  summarizePreset,
} from "../model/preset.model"
import { PresetService } from "../services/preset-service"

export type PresetServices = {
  presetStore: RecordStore<PresetName, Preset>
  presetSummaries: MetadataCache<PresetName, PresetSummary>
  presetService: PresetService
}

export function createPresetServices(
  core: CoreServices,
  { presetStore: store }: InfraClients,
): PresetServices {
  const presetSummaries = new MemoryMetadataCache<PresetName, Preset, PresetSummary>({
    store,
    derive: summarizePreset,
    logger: core.logger.child({ module: "preset-summaries" }),
  })

  const presetStore = new InvalidatingRecordStore({
    store,
    cache: presetSummaries,
    idOf: presetName,
  })

  const presetService = new PresetService({
    store: presetStore,
    summaries: presetSummaries,
    clock: core.clock,
    logger: core.logger,
    loadBuiltins: () => loadBuiltinPresets(),
  })

  return { presetStore, presetSummaries, presetService }
}
