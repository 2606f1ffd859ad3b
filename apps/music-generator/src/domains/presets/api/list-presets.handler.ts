import type { Context, RequestHandler } from "@tunesmith/server"
import type { PresetServices } from "../composition"
import type { PresetSummary } from "../model/preset.model"

export function listPresetsHandler({ presetService }: PresetServices): RequestHandler {
  return async (c: Context) => {
    const presets = await presetService.list()

    return c.json<{ presets: PresetSummary[] }>({ presets })
  }
}
