import type { Milliseconds } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import { GoogleAuth } from "google-auth-library"
import {
  DEFAULT_LOCATION,
  DEFAULT_MODEL,
  type GenerationClientConfig,
} from "../model/client-config"
import { GenerationError } from "../model/generation.errors"
import type { MusicGenerationClient } from "../model/track.model"
import { SimulatedMusicClient } from "./simulated-music-client"
import {
  type AuthorizedRequest,
  type AuthorizedRequester,
  VertexLyriaClient,
} from "./vertex-lyria-client"

const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform"

export type GenerationClientFactoryDeps = {
  logger: Logger
  timeoutMs: Milliseconds
  /** @default Application Default Credentials via google-auth-library */
  createRequester?: () => Promise<AuthorizedRequester>
}

export async function createGoogleRequester(): Promise<AuthorizedRequester> {
  const auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] })

  // Resolves and caches Application Default Credentials.
  await auth.getClient()

  return {
    request: (opts: AuthorizedRequest) => auth.request<unknown>(opts),
  }
}

/**
 * Build a client for `config`. Vertex clients resolve credentials here, once
 * per client, which is what makes them worth caching.
 *
 * @throws {GenerationError} `invalid_client_config` for a vertex config without
 * a project id or when credentials cannot be loaded
 */
export function createGenerationClientFactory(deps: GenerationClientFactoryDeps) {
  const createRequester = deps.createRequester ?? createGoogleRequester

  return async (config: GenerationClientConfig): Promise<MusicGenerationClient> => {
    if (config.mode === "simulate") return new SimulatedMusicClient()

    if (!config.projectId) {
      throw GenerationError.invalidClientConfig(
        "A GCP project id is required for vertex generation (set GCP_PROJECT_ID)",
        { mode: config.mode },
      )
    }

    const location = config.location || DEFAULT_LOCATION
    const model = config.model || DEFAULT_MODEL

    let requester: AuthorizedRequester

    try {
      requester = await createRequester()
    } catch (err) {
      throw GenerationError.invalidClientConfig(
        "Could not load Google Cloud credentials",
        { projectId: config.projectId },
        err,
      )
    }

    deps.logger.info("Vertex client created", { projectId: config.projectId, location, model })

    return new VertexLyriaClient(
      { requester, logger: deps.logger },
      { projectId: config.projectId, location, model, timeoutMs: deps.timeoutMs },
    )
  }
}
