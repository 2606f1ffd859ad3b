/**
 * Well-known fields bound to a logger through `child()`.
 */
export type LogContext = {
  service: string
  env: string
  module: string

  requestId: string
  method: string
  path: string
  route: string

  command: string
  preset: string
  mode: string
  model: string
  trackId: string
}

export type LogOutcome = {
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields merged into an existing context by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
