import type { AppContextOptions } from "../app/create-context"

export type OutputStream = {
  write(chunk: string): unknown
}

export type CliDeps = {
  out: OutputStream
  err: OutputStream
  env: NodeJS.ProcessEnv
  cwd: string
  /** Applied to every context the CLI creates. Tests swap stores and loggers here. */
  contextOverrides?: Pick<
    AppContextOptions,
    "coreOverrides" | "infraOverrides" | "domainOverrides" | "configOverrides"
  >
  /** Starts the HTTP server. @default run() from the server module */
  serve: (options: AppContextOptions) => Promise<void>
}

export type GlobalOptions = {
  presetsDir?: string
  logLevel?: string
  quiet?: boolean
}
