import { MemoryRecordStore } from "@tunesmith/cache"
import { type Preset, type PresetName, presetName } from "../model/preset.model"

/** In-process preset store for tests and throwaway runs. Ids enumerate sorted. */
export class MemoryPresetStore extends MemoryRecordStore<PresetName, Preset> {
  constructor(initial: readonly Preset[] = []) {
    super(presetName, initial)
  }

  override async enumerateIds(): Promise<PresetName[]> {
    return (await super.enumerateIds()).sort()
  }
}
