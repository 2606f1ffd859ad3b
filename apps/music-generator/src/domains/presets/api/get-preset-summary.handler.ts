import type { Context, RequestHandler } from "@tunesmith/server"
import { requireParam } from "../../../lib/require-param"
import type { PresetServices } from "../composition"
import type { PresetSummary } from "../model/preset.model"

export function getPresetSummaryHandler({ presetService }: PresetServices): RequestHandler {
  return async (c: Context) => {
    const summary = await presetService.getSummary(requireParam(c, "name"))

    return c.json<PresetSummary>(summary)
  }
}
