import type { z } from "zod/mini"
import { presetFieldsSchema } from "../model/preset.model"

/** Body of `PUT /presets/:name`. The name comes from the path. */
export const putPresetRequestSchema = presetFieldsSchema

export type PutPresetRequest = z.infer<typeof putPresetRequestSchema>
