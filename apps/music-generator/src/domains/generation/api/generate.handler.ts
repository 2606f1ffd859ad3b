import { type Context, parseOrThrow, type RequestHandler } from "@tunesmith/server"
import { readJsonBody } from "../../../lib/read-json-body"
import type { GenerationServices } from "../composition"
import type { GenerationResult } from "../model/track.model"
import type { GenerateInput } from "../services/track-generator"
import {
  type GenerateRequest,
  type GenerateResponse,
  generateRequestSchema,
} from "./generate.api.schema"

export function toGenerateInput(request: GenerateRequest): GenerateInput {
  const { preset, sampleCount, mode, projectId, location, model, ...track } = request

  return {
    preset,
    sampleCount,
    track,
    client: { mode, projectId, location, model },
  }
}

export function toGenerateResponse(result: GenerationResult): GenerateResponse {
  return {
    id: result.id,
    mode: result.mode,
    model: result.model,
    prompt: result.prompt,
    track: result.track,
    createdAt: result.createdAt,
    elapsedMs: result.elapsedMs,
    clips: result.clips.map((clip) => ({
      mimeType: clip.mimeType,
      audioBase64: clip.data.toString("base64"),
    })),
  }
}

export function generateHandler({ trackGenerator }: GenerationServices): RequestHandler {
  return async (c: Context) => {
    const request = parseOrThrow(generateRequestSchema, await readJsonBody(c))
    const result = await trackGenerator.generate(toGenerateInput(request))

    return c.json<GenerateResponse>(toGenerateResponse(result), 201)
  }
}
