import { Command } from "commander"
import { loadRawConfig } from "../../app/config"
import type { CliDeps, GlobalOptions } from "../cli-deps"
import { formatConfigEntries } from "../output"
import { cliValuesFrom } from "../with-context"

export function createConfigCommand(deps: CliDeps): Command {
  const config = new Command("config").description("inspect configuration")

  config
    .command("show")
    .description("print the effective configuration and where each value came from")
    .option("--json", "print as JSON")
    .action(async (flags: { json?: boolean }, cmd: Command) => {
      const loaded = await loadRawConfig(deps.env, {
        cwd: deps.cwd,
        cliValues: cliValuesFrom(cmd.optsWithGlobals<GlobalOptions>()),
      })

      const entries = loaded.entries()

      deps.out.write(
        flags.json
          ? `${JSON.stringify(entries, null, 2)}\n`
          : `${formatConfigEntries(entries)}\n`,
      )
    })

  return config
}
