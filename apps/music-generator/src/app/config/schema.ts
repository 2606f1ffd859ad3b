import type { Milliseconds } from "@tunesmith/clock"
import { type LogLevelName, logLevelNames } from "@tunesmith/logger"
import { z } from "zod/mini"
import { type GenerationMode, generationModes } from "../../domains/generation/model/client-config"

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Music Track Generator"),

  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(z.coerce.number(), 8080),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),

  PRESETS_DIR: z._default(z.string(), "presets"),
  PRESETS_SEED_ON_START: z._default(z.stringbool(), true),
  OUTPUT_DIR: z._default(z.string(), "output"),

  GENERATION_MODE: z._default(z.enum(generationModes), "simulate"),
  GCP_PROJECT_ID: z.optional(z.string()),
  GCP_LOCATION: z._default(z.string(), "us-central1"),
  GENERATION_MODEL: z._default(z.string(), "lyria-002"),
  GENERATION_TIMEOUT_MS: z._default(z.coerce.number(), 120_000),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    header: string
  }

  requestLogging: {
    enabled: boolean
  }

  presets: {
    dir: string
    seedOnStart: boolean
  }

  generation: {
    mode: GenerationMode
    projectId?: string
    location: string
    model: string
    timeoutMs: Milliseconds
    outputDir: string
  }
}
