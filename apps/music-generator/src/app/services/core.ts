import { SystemClock } from "@tunesmith/clock"
import { createPinoLogger, type Logger } from "@tunesmith/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: SystemClock
}

export type CoreServicesOptions = {
  /** 2 routes logs to stderr, which the CLI needs. @default 1 */
  logFd?: 1 | 2
}

export function createCoreServices(
  config: AppConfig,
  options: CoreServicesOptions = {},
): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
      ...(options.logFd !== undefined && { fd: options.logFd }),
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return { clock, logger }
}
