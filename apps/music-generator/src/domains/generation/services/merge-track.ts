import { DEFAULT_DURATION_SECONDS, type PresetFields } from "../../presets/model/preset.model"
import type { TrackConfig, TrackOverrides } from "../model/track.model"

/** Explicit overrides win field by field over the preset; absent fields stay absent. */
export function mergeTrack(
  preset: PresetFields | undefined,
  overrides: TrackOverrides = {},
): TrackConfig {
  const mood = overrides.mood ?? preset?.mood
  const tempoBpm = overrides.tempoBpm ?? preset?.tempoBpm
  const negativePrompt = overrides.negativePrompt ?? preset?.negativePrompt

  return {
    text: overrides.text ?? "",
    genre: overrides.genre ?? preset?.genre ?? "",
    ...(mood !== undefined && { mood }),
    ...(tempoBpm !== undefined && { tempoBpm }),
    instruments: overrides.instruments ?? preset?.instruments ?? [],
    durationSeconds:
      overrides.durationSeconds ?? preset?.durationSeconds ?? DEFAULT_DURATION_SECONDS,
    structure: overrides.structure ?? preset?.structure ?? [],
    ...(negativePrompt !== undefined && { negativePrompt }),
    ...(overrides.seed !== undefined && { seed: overrides.seed }),
  }
}
