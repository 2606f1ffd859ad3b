import fs from "node:fs/promises"
import path from "node:path"
import * as yaml from "js-yaml"
import { z } from "zod/mini"
import { type PresetDefinition, presetDefinitionSchema } from "../model/preset.model"

export const BUILTIN_PRESETS_FILE = path.join(__dirname, "..", "data", "builtin-presets.yaml")

const builtinPresetsSchema = z.array(presetDefinitionSchema)

export async function loadBuiltinPresets(
  file: string = BUILTIN_PRESETS_FILE,
): Promise<PresetDefinition[]> {
  const raw: unknown = yaml.load(await fs.readFile(file, "utf-8"), {
    schema: yaml.JSON_SCHEMA,
  })

  return z.parse(builtinPresetsSchema, raw)
}
