import { Command } from "commander"
import type { CliDeps } from "../cli-deps"
import { parseNumber } from "../track-options"
import { contextOptionsFor } from "../with-context"

type ServeFlags = {
  host?: string
  port?: number
}

export function createServeCommand(deps: CliDeps): Command {
  return new Command("serve")
    .description("start the HTTP API")
    .option("--host <host>", "interface to bind")
    .option("--port <port>", "port to listen on", parseNumber)
    .action(async (flags: ServeFlags, cmd: Command) => {
      const options = contextOptionsFor(deps, cmd)

      await deps.serve({
        ...options,
        logFd: 1,
        cliValues: {
          ...options.cliValues,
          SERVER_HOST: flags.host,
          SERVER_PORT: flags.port === undefined ? undefined : String(flags.port),
        },
      })
    })
}
