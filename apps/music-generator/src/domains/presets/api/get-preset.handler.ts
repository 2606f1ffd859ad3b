import type { Context, RequestHandler } from "@tunesmith/server"
import { requireParam } from "../../../lib/require-param"
import type { PresetServices } from "../composition"
import type { Preset } from "../model/preset.model"

export function getPresetHandler({ presetService }: PresetServices): RequestHandler {
  return async (c: Context) => {
    const preset = await presetService.get(requireParam(c, "name"))

    return c.json<Preset>(preset)
  }
}
