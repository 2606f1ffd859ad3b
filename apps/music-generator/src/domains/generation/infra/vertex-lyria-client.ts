import { createNullLogger, type Logger } from "@tunesmith/logger"
import { z } from "zod/mini"
import { GenerationError } from "../model/generation.errors"
import type {
  AudioClip,
  GeneratedAudio,
  GenerationRequest,
  MusicGenerationClient,
} from "../model/track.model"

export type AuthorizedRequest = {
  url: string
  method: "POST"
  data: unknown
  timeout: number
}

/**
 * Sends requests with Google credentials attached. The response body is
 * validated by the caller.
 */
export interface AuthorizedRequester {
  request(opts: AuthorizedRequest): Promise<{ data: unknown }>
}

export type VertexLyriaClientDeps = {
  requester: AuthorizedRequester
  logger?: Logger
}

export type VertexLyriaClientOptions = {
  projectId: string
  location: string
  model: string
  timeoutMs: number
}

const predictResponseSchema = z.object({
  predictions: z._default(
    z.array(
      z.object({
        bytesBase64Encoded: z.string(),
        mimeType: z.optional(z.string()),
      }),
    ),
    [],
  ),
})

type PredictInstance = {
  prompt: string
  negative_prompt?: string
  seed?: number
}

type PredictBody = {
  instances: PredictInstance[]
  parameters: { sample_count?: number }
}

export class VertexLyriaClient implements MusicGenerationClient {
  readonly mode = "vertex"
  readonly model: string

  private readonly logger: Logger

  constructor(
    private readonly deps: VertexLyriaClientDeps,
    private readonly opts: VertexLyriaClientOptions,
  ) {
    this.model = opts.model
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "vertex-lyria" })
  }

  get endpoint(): string {
    const { projectId, location, model } = this.opts

    return (
      `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}` +
      `/locations/${location}/publishers/google/models/${model}:predict`
    )
  }

  async generate(request: GenerationRequest): Promise<GeneratedAudio> {
    const context = { model: this.model, location: this.opts.location }

    let payload: unknown

    try {
      const res = await this.deps.requester.request({
        url: this.endpoint,
        method: "POST",
        data: this.toBody(request),
        timeout: this.opts.timeoutMs,
      })
      payload = res.data
    } catch (err) {
      throw GenerationError.failed("Vertex AI prediction request failed", context, err)
    }

    const parsed = z.safeParse(predictResponseSchema, payload)

    if (!parsed.success) {
      throw GenerationError.failed("Unexpected response from Vertex AI", context, parsed.error)
    }

    if (parsed.data.predictions.length === 0) {
      throw GenerationError.failed("Vertex AI returned no audio", context)
    }

    this.logger.debug("Prediction received", {
      ...context,
      clips: parsed.data.predictions.length,
    })

    return {
      clips: parsed.data.predictions.map(
        (p): AudioClip => ({
          mimeType: "audio/wav",
          data: Buffer.from(p.bytesBase64Encoded, "base64"),
        }),
      ),
    }
  }

  private toBody(request: GenerationRequest): PredictBody {
    // The API rejects seed and sample_count together.
    const sampleCount = request.seed === undefined ? request.sampleCount : undefined

    return {
      instances: [
        {
          prompt: request.prompt,
          ...(request.negativePrompt && { negative_prompt: request.negativePrompt }),
          ...(request.seed !== undefined && { seed: request.seed }),
        },
      ],
      parameters: {
        ...(sampleCount !== undefined && { sample_count: sampleCount }),
      },
    }
  }
}
