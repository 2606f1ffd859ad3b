import { randomUUID } from "node:crypto"
import type { Milliseconds, TimeSource } from "@tunesmith/clock"
import type { Logger, LogLevelName } from "@tunesmith/logger"
import type { ErrorMappingsConfig } from "../errors/error-formatter"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application } from "./app"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: TimeSource
}

export interface EnabledRequestIdConfig {
  enabled: true

  /**
   * Inbound header carrying a caller's request id. The id is echoed on the
   * response and attached to every log line and error body.
   * @default "x-request-id"
   */
  header?: string

  /** @default crypto.randomUUID() */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths, unless health routes are disabled */
  ignorePaths?: PathString[]
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString
}

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /**
   * Budget for the start hooks, preset seeding included.
   * @default no timeout
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Budget for closing the listener and running the stop hooks. In-flight
   * generation requests that outlive it are not cut off.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorMappings: ErrorMappingsConfig

  /** Registers the API routes after health routes and default middleware. */
  routes: (app: Application) => void

  /** Run in order before listening; the first failure aborts startup. */
  startHooks?: LifecycleHook[]

  /** Run in order after the listener closes; every hook runs. */
  stopHooks?: LifecycleHook[]
}

// --- Resolved types ---

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorMappings: ErrorMappingsConfig

  routes: (app: Application) => void
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

// --- Defaults ---

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

export const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    generate: () => randomUUID(),
  },
  requestLogging: {
    enabled: true,
    level: "info",
  },
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
  },
} as const satisfies {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLogging: { enabled: true; level: LogLevelName }
  health: Required<EnabledHealthConfig>
}

// --- Resolution ---

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestIdConfig(options),
    requestLogging: resolveRequestLoggingConfig(options, health),
    health,
    errorMappings: options.errorMappings,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealthConfig(options: ServerOptions): ResolvedHealthConfig {
  if (options.health?.enabled === false) {
    return { enabled: false }
  }

  return {
    enabled: true,
    livenessPath: options.health?.livenessPath ?? DEFAULTS.health.livenessPath,
    readinessPath: options.health?.readinessPath ?? DEFAULTS.health.readinessPath,
  }
}

function resolveRequestIdConfig(options: ServerOptions): ResolvedRequestIdConfig {
  if (options.requestId?.enabled === false) {
    return { enabled: false }
  }

  return {
    enabled: true,
    header: options.requestId?.header ?? DEFAULTS.requestId.header,
    generate: options.requestId?.generate ?? DEFAULTS.requestId.generate,
  }
}

function resolveRequestLoggingConfig(
  options: ServerOptions,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (options.requestLogging?.enabled === false) {
    return { enabled: false }
  }

  return {
    enabled: true,
    level: options.requestLogging?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      options.requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
