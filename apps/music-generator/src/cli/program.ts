import { logLevelNames } from "@tunesmith/logger"
import { Command, CommanderError, Option } from "commander"
import { run } from "../server/run"
import type { CliDeps } from "./cli-deps"
import { createConfigCommand } from "./commands/config"
import { createGenerateCommand } from "./commands/generate"
import { createPresetsCommand } from "./commands/presets"
import { createServeCommand } from "./commands/serve"
import { formatError } from "./output"

export const CLI_VERSION = "0.1.0"

export function defaultCliDeps(): CliDeps {
  return {
    out: process.stdout,
    err: process.stderr,
    env: process.env,
    cwd: process.cwd(),
    serve: run,
  }
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command("music-gen")
    .description("Generate music tracks and manage presets")
    .version(CLI_VERSION)
    .option("--presets-dir <dir>", "directory holding preset YAML files")
    .addOption(new Option("--log-level <level>", "minimum log level").choices(logLevelNames))
    .option("-q, --quiet", "disable logging")

  for (const sub of [
    createGenerateCommand(deps),
    createPresetsCommand(deps),
    createConfigCommand(deps),
    createServeCommand(deps),
  ]) {
    program.addCommand(sub)
  }

  // addCommand() does not pass settings down, so apply them to the whole tree.
  forEachCommand(program, (cmd) => {
    cmd.exitOverride().configureOutput({
      writeOut: (s) => deps.out.write(s),
      writeErr: (s) => deps.err.write(s),
    })
  })

  return program
}

function forEachCommand(cmd: Command, fn: (cmd: Command) => void): void {
  fn(cmd)

  for (const sub of cmd.commands) forEachCommand(sub, fn)
}

/**
 * Parse and run one command line. Resolves to the process exit code; never
 * rejects.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps)

  try {
    await program.parseAsync([...argv], { from: "user" })
    return 0
  } catch (err) {
    // Commander has already printed its own usage errors.
    if (err instanceof CommanderError) return err.exitCode

    deps.err.write(`${formatError(err)}\n`)
    return 1
  }
}
