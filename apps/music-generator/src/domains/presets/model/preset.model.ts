import { z } from "zod/mini"

export const PRESET_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/

export const presetNameSchema = z.string().check(
  z.minLength(1, { error: "Preset name cannot be empty" }),
  z.maxLength(64, { error: "Preset name cannot exceed 64 characters" }),
  z.regex(PRESET_NAME_PATTERN, {
    error: "Preset name must use lowercase letters, digits, '-' or '_'",
  }),
)

export const trackSectionSchema = z.object({
  name: z.string().check(z.minLength(1, { error: "Section name cannot be empty" })),
  description: z.optional(z.string()),
})

export const tempoBpmSchema = z.int().check(
  z.gte(20, { error: "Tempo must be at least 20 BPM" }),
  z.lte(300, { error: "Tempo cannot exceed 300 BPM" }),
)

export const durationSecondsSchema = z.number().check(
  z.gte(5, { error: "Duration must be at least 5 seconds" }),
  z.lte(300, { error: "Duration cannot exceed 300 seconds" }),
)

export const DEFAULT_DURATION_SECONDS = 30

/** The user-editable part of a preset. */
export const presetFieldsSchema = z.object({
  description: z._default(z.string(), ""),
  genre: z.string().check(z.minLength(1, { error: "Genre cannot be empty" })),
  mood: z.optional(z.string()),
  tempoBpm: z.optional(tempoBpmSchema),
  instruments: z._default(z.array(z.string()), []),
  durationSeconds: z._default(durationSecondsSchema, DEFAULT_DURATION_SECONDS),
  structure: z._default(z.array(trackSectionSchema), []),
  negativePrompt: z.optional(z.string()),
})

export const presetDefinitionSchema = z.extend(presetFieldsSchema, {
  name: presetNameSchema,
})

export const presetSchema = z.extend(presetDefinitionSchema, {
  builtin: z._default(z.boolean(), false),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export type PresetName = string
export type PresetFields = z.infer<typeof presetFieldsSchema>
export type PresetFieldsInput = z.input<typeof presetFieldsSchema>
export type PresetDefinition = z.infer<typeof presetDefinitionSchema>
export type PresetInput = z.input<typeof presetDefinitionSchema>
export type Preset = z.infer<typeof presetSchema>

export type PresetSummary = {
  name: PresetName
  description: string
  genre: string
  mood?: string
  tempoBpm?: number
}

export function presetName(preset: Preset): PresetName {
  return preset.name
}

export function isPresetName(value: string): boolean {
  return z.safeParse(presetNameSchema, value).success
}

export function summarizePreset(preset: Preset): PresetSummary {
  return {
    name: preset.name,
    description: preset.description,
    genre: preset.genre,
    ...(preset.mood !== undefined && { mood: preset.mood }),
    ...(preset.tempoBpm !== undefined && { tempoBpm: preset.tempoBpm }),
  }
}
