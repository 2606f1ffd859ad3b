import pino, {
  type DestinationStream,
  type Logger as PinoBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Write JSON lines here instead of a file descriptor. Ignores `prettify`. */
  destination?: DestinationStream

  /** Existing pino instance to derive from. Set by `child()`. */
  base?: PinoBase
}

export type PinoLoggerOptions = Partial<LoggerOptions> & {
  /**
   * File descriptor to write to when no destination is injected. The CLI uses
   * 2 so that stdout carries only command output.
   * @default 1
   */
  fd?: 1 | 2
}

function createBase(deps: PinoLoggerDeps, opts: PinoLoggerOptions): PinoBase {
  const pinoOpts: PinoOptions = {
    level: opts.level ?? "info",
    serializers: { err: errWithCause },
  }

  if (deps.destination) return pino(pinoOpts, deps.destination)

  const fd = opts.fd ?? 1

  if (opts.prettify) {
    return pino({
      ...pinoOpts,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: fd,
        },
      },
    })
  }

  return pino(pinoOpts, pino.destination(fd))
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly logger: PinoBase

  constructor(
    deps: PinoLoggerDeps = {},
    opts: PinoLoggerOptions = {},
    context: LogContextPatch = {},
  ) {
    this.logger = (deps.base ?? createBase(deps, opts)).child(context)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, {}, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: PinoLoggerOptions = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
