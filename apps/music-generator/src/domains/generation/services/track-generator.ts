import { randomUUID } from "node:crypto"
import type { InstanceCache } from "@tunesmith/cache"
import { startStopwatch, type TimeSource } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import type { Preset, PresetName } from "../../presets/model/preset.model"
import {
  type ClientOverrides,
  type GenerationClientConfig,
  resolveClientConfig,
} from "../model/client-config"
import type {
  GenerationResult,
  MusicGenerationClient,
  TrackOverrides,
} from "../model/track.model"
import { buildPrompt } from "./build-prompt"
import { mergeTrack } from "./merge-track"

export type GenerateInput = {
  preset?: PresetName | undefined
  track?: TrackOverrides
  client?: ClientOverrides
  sampleCount?: number | undefined
}

export type TrackGeneratorDeps = {
  presets: { get(name: PresetName): Promise<Preset> }
  clients: InstanceCache<GenerationClientConfig, MusicGenerationClient>
  clock: TimeSource
  logger: Logger
  defaultClient: GenerationClientConfig
  /** @default crypto.randomUUID() */
  generateId?: () => string
}

export class TrackGenerator {
  private readonly logger: Logger
  private readonly generateId: () => string

  constructor(private readonly deps: TrackGeneratorDeps) {
    this.logger = deps.logger.child({ module: "generation" })
    this.generateId = deps.generateId ?? randomUUID
  }

  /**
   * Resolve the track and client, then generate.
   *
   * @throws {PresetError} `preset_not_found` for an unknown preset
   * @throws {GenerationError} for an empty prompt, a bad client config or a failed call
   */
  async generate(input: GenerateInput): Promise<GenerationResult> {
    const preset =
      input.preset === undefined ? undefined : await this.deps.presets.get(input.preset)
    const track = mergeTrack(preset, input.track)
    const prompt = buildPrompt(track)

    const clientConfig = resolveClientConfig(this.deps.defaultClient, input.client)
    const client = await this.deps.clients.getOrCreate(clientConfig)

    const id = this.generateId()
    const log = this.logger.child({ trackId: id, mode: client.mode, model: client.model })
    const watch = startStopwatch(this.deps.clock)

    log.info("Generating track", {
      ...(input.preset !== undefined && { preset: input.preset }),
      durationSeconds: track.durationSeconds,
    })

    const audio = await client.generate({
      prompt,
      durationSeconds: track.durationSeconds,
      ...(track.negativePrompt && { negativePrompt: track.negativePrompt }),
      ...(track.seed !== undefined && { seed: track.seed }),
      ...(input.sampleCount !== undefined && { sampleCount: input.sampleCount }),
    })

    const elapsedMs = watch.elapsedMs()

    log.info("Track generated", { clips: audio.clips.length, durationMs: elapsedMs })

    return {
      id,
      mode: client.mode,
      model: client.model,
      prompt,
      track,
      clips: audio.clips,
      createdAt: this.deps.clock.now().toISOString(),
      elapsedMs,
    }
  }
}
