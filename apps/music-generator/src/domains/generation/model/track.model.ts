import type { GenerationMode } from "./client-config"

export type TrackSection = {
  name: string
  description?: string | undefined
}

export type TrackConfig = {
  text: string
  genre: string
  mood?: string
  tempoBpm?: number
  instruments: string[]
  durationSeconds: number
  structure: TrackSection[]
  negativePrompt?: string
  seed?: number
}

/** Explicit values that win over a preset's. Undefined means "not given". */
export type TrackOverrides = {
  [K in keyof TrackConfig]?: TrackConfig[K] | undefined
}

export type AudioClip = {
  mimeType: "audio/wav"
  data: Buffer
}

export type GenerationRequest = {
  prompt: string
  durationSeconds: number
  negativePrompt?: string
  seed?: number
  sampleCount?: number
}

export type GeneratedAudio = {
  clips: AudioClip[]
}

export interface MusicGenerationClient {
  readonly mode: GenerationMode
  readonly model: string

  generate(request: GenerationRequest): Promise<GeneratedAudio>
}

export type GenerationResult = {
  id: string
  mode: GenerationMode
  model: string
  prompt: string
  track: TrackConfig
  clips: AudioClip[]
  createdAt: string
  elapsedMs: number
}
