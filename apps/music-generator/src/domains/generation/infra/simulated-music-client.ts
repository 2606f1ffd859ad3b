import type {
  GeneratedAudio,
  GenerationRequest,
  MusicGenerationClient,
} from "../model/track.model"
import { type PcmFormat, silentWav } from "./wav"

export const SIMULATED_MODEL = "simulated"

const FORMAT: PcmFormat = { sampleRate: 8_000, channels: 1 }

/**
 * Offline client for development and tests. Returns silent clips of the
 * requested duration without any network access.
 */
export class SimulatedMusicClient implements MusicGenerationClient {
  readonly mode = "simulate"
  readonly model = SIMULATED_MODEL

  async generate(request: GenerationRequest): Promise<GeneratedAudio> {
    const count = request.sampleCount ?? 1

    return {
      clips: Array.from({ length: count }, () => ({
        mimeType: "audio/wav" as const,
        data: silentWav(request.durationSeconds, FORMAT),
      })),
    }
  }
}
