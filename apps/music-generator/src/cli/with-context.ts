import { NullLogger } from "@tunesmith/logger"
import type { Command } from "commander"
import { type AppContext, type AppContextOptions, createAppContext } from "../app/create-context"
import type { CliDeps, GlobalOptions } from "./cli-deps"

export function cliValuesFrom(global: GlobalOptions): Record<string, string | undefined> {
  return {
    PRESETS_DIR: global.presetsDir,
    LOG_LEVEL: global.logLevel,
  }
}

export function contextOptionsFor(deps: CliDeps, command: Command): AppContextOptions {
  const global = command.optsWithGlobals<GlobalOptions>()
  const overrides = deps.contextOverrides ?? {}

  return {
    ...overrides,
    env: deps.env,
    cwd: deps.cwd,
    logFd: 2,
    cliValues: cliValuesFrom(global),
    ...(global.quiet && {
      coreOverrides: { ...overrides.coreOverrides, logger: new NullLogger() },
    }),
  }
}

/**
 * Run `fn` with a fresh application context. Cached generation clients are
 * dropped afterwards, also when `fn` throws.
 */
export async function withContext<T>(
  deps: CliDeps,
  command: Command,
  fn: (ctx: AppContext) => Promise<T>,
): Promise<T> {
  const ctx = await createAppContext(contextOptionsFor(deps, command))
  const logger = ctx.services.core.logger.child({ command: command.name() })

  logger.debug("Command started")

  try {
    return await fn(ctx)
  } finally {
    ctx.services.domains.generation.clientCache.clear()
    logger.debug("Command finished")
  }
}
