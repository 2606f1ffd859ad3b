import { MemoryInstanceCache } from "@tunesmith/cache"
import { FakeClock } from "@tunesmith/clock"
import { NullLogger } from "@tunesmith/logger"
import { PresetError } from "../../../presets/model/preset.errors"
import type { Preset } from "../../../presets/model/preset.model"
import { clientConfigKey, type GenerationClientConfig } from "../../model/client-config"
import type {
  GeneratedAudio,
  GenerationRequest,
  MusicGenerationClient,
} from "../../model/track.model"
import { TrackGenerator } from "../track-generator"

const START = Date.parse("2026-03-01T12:00:00.000Z")

const lofi: Preset = {
  name: "lofi",
  description: "Dusty beats",
  genre: "lofi hip hop",
  tempoBpm: 80,
  instruments: ["piano"],
  durationSeconds: 20,
  structure: [],
  builtin: true,
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-01T00:00:00.000Z",
}

class RecordingClient implements MusicGenerationClient {
  readonly mode = "simulate"
  readonly model = "fake-model"
  readonly requests: GenerationRequest[] = []

  constructor(private readonly clock: FakeClock) {}

  async generate(request: GenerationRequest): Promise<GeneratedAudio> {
    this.requests.push(request)
    this.clock.advance(250)

    return { clips: [{ mimeType: "audio/wav", data: Buffer.from("clip") }] }
  }
}

function setup() {
  const clock = new FakeClock(START)
  const client = new RecordingClient(clock)
  const factory = vi.fn(
    async (_config: GenerationClientConfig): Promise<MusicGenerationClient> => client,
  )
  const presets = {
    get: vi.fn(async (name: string): Promise<Preset> => {
      if (name === lofi.name) return lofi
      throw PresetError.notFound(name)
    }),
  }

  const generator = new TrackGenerator({
    presets,
    clients: new MemoryInstanceCache({ keyOf: clientConfigKey, factory }),
    clock,
    logger: new NullLogger(),
    defaultClient: { mode: "simulate" },
    generateId: () => "track-1",
  })

  return { generator, client, factory, presets }
}

describe("TrackGenerator", () => {
  it("generates from a preset plus explicit text", async () => {
    const { generator, client } = setup()

    const result = await generator.generate({ preset: "lofi", track: { text: "rainy day" } })

    const prompt = [
      "rainy day",
      "Genre: lofi hip hop",
      "Tempo: 80 BPM",
      "Instruments: piano",
      "Duration: 20 seconds",
    ].join("\n")

    expect(result).toEqual({
      id: "track-1",
      mode: "simulate",
      model: "fake-model",
      prompt,
      track: {
        text: "rainy day",
        genre: "lofi hip hop",
        tempoBpm: 80,
        instruments: ["piano"],
        durationSeconds: 20,
        structure: [],
      },
      clips: [{ mimeType: "audio/wav", data: Buffer.from("clip") }],
      createdAt: "2026-03-01T12:00:00.250Z",
      elapsedMs: 250,
    })
    expect(client.requests).toEqual([{ prompt, durationSeconds: 20 }])
  })

  it("passes seed, negative prompt and sample count to the client", async () => {
    const { generator, client } = setup()

    await generator.generate({
      track: { genre: "rock", seed: 3, negativePrompt: "vocals" },
      sampleCount: 2,
    })

    expect(client.requests).toEqual([
      {
        prompt: "Genre: rock\nDuration: 30 seconds",
        durationSeconds: 30,
        negativePrompt: "vocals",
        seed: 3,
        sampleCount: 2,
      },
    ])
  })

  it("resolves per-request client settings over the default", async () => {
    const { generator, factory } = setup()

    await generator.generate({
      track: { genre: "rock" },
      client: { mode: "vertex", projectId: "demo-project" },
    })

    expect(factory).toHaveBeenCalledWith({
      mode: "vertex",
      projectId: "demo-project",
      location: "us-central1",
      model: "lyria-002",
    })
  })

  it("reuses the cached client across requests", async () => {
    const { generator, factory } = setup()

    await generator.generate({ track: { genre: "rock" } })
    await generator.generate({ track: { genre: "jazz" } })

    expect(factory).toHaveBeenCalledTimes(1)
  })

  it("rejects an unknown preset before building a client", async () => {
    const { generator, factory } = setup()

    await expect(generator.generate({ preset: "missing" })).rejects.toMatchObject({
      code: "preset_not_found",
    })
    expect(factory).not.toHaveBeenCalled()
  })

  it("rejects an empty prompt before building a client", async () => {
    const { generator, factory } = setup()

    await expect(generator.generate({ track: { mood: "happy" } })).rejects.toMatchObject({
      code: "empty_prompt",
    })
    expect(factory).not.toHaveBeenCalled()
  })
})
