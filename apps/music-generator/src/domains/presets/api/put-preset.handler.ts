import { type Context, parseOrThrow, type RequestHandler } from "@tunesmith/server"
import { readJsonBody } from "../../../lib/read-json-body"
import { requireParam } from "../../../lib/require-param"
import type { PresetServices } from "../composition"
import type { Preset } from "../model/preset.model"
import { putPresetRequestSchema } from "./preset.api.schema"

export function putPresetHandler({ presetService }: PresetServices): RequestHandler {
  return async (c: Context) => {
    const body = parseOrThrow(putPresetRequestSchema, await readJsonBody(c))

    const { preset, created } = await presetService.save({
      ...body,
      name: requireParam(c, "name"),
    })

    return c.json<Preset>(preset, created ? 201 : 200)
  }
}
