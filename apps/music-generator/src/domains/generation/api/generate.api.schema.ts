import { z } from "zod/mini"
import {
  durationSecondsSchema,
  presetNameSchema,
  tempoBpmSchema,
  trackSectionSchema,
} from "../../presets/model/preset.model"
import { generationModes } from "../model/client-config"
import type { TrackConfig } from "../model/track.model"

export const generateRequestSchema = z.object({
  preset: z.optional(presetNameSchema),

  text: z.optional(z.string()),
  genre: z.optional(z.string()),
  mood: z.optional(z.string()),
  tempoBpm: z.optional(tempoBpmSchema),
  instruments: z.optional(z.array(z.string())),
  durationSeconds: z.optional(durationSecondsSchema),
  structure: z.optional(z.array(trackSectionSchema)),
  negativePrompt: z.optional(z.string()),
  seed: z.optional(z.int().check(z.gte(0, { error: "Seed cannot be negative" }))),
  sampleCount: z.optional(
    z.int().check(
      z.gte(1, { error: "Sample count must be at least 1" }),
      z.lte(4, { error: "Sample count cannot exceed 4" }),
    ),
  ),

  mode: z.optional(z.enum(generationModes, { error: "Mode must be simulate or vertex" })),
  projectId: z.optional(z.string()),
  location: z.optional(z.string()),
  model: z.optional(z.string()),
})

export type GenerateRequest = z.infer<typeof generateRequestSchema>

export type GenerateResponse = {
  id: string
  mode: string
  model: string
  prompt: string
  track: TrackConfig
  createdAt: string
  elapsedMs: number
  clips: { mimeType: string; audioBase64: string }[]
}
