import type { Context, RequestHandler } from "@tunesmith/server"
import { requireParam } from "../../../lib/require-param"
import type { PresetServices } from "../composition"

export function deletePresetHandler({ presetService }: PresetServices): RequestHandler {
  return async (c: Context) => {
    await presetService.delete(requireParam(c, "name"))

    return c.body(null, 204)
  }
}
