import { parseOrThrow } from "@tunesmith/server"
import { Command, Option } from "commander"
import { generateRequestSchema } from "../../domains/generation/api/generate.api.schema"
import { toGenerateInput } from "../../domains/generation/api/generate.handler"
import { generationModes } from "../../domains/generation/model/client-config"
import { saveClips } from "../../domains/generation/services/save-clips"
import type { CliDeps } from "../cli-deps"
import { formatGeneration } from "../output"
import {
  addTrackOptions,
  parseNumber,
  type TrackFlagValues,
  trackFieldsFrom,
} from "../track-options"
import { withContext } from "../with-context"

type GenerateFlags = TrackFlagValues & {
  preset?: string
  seed?: number
  samples?: number
  mode?: string
  project?: string
  location?: string
  model?: string
  output?: string
  json?: boolean
}

export function createGenerateCommand(deps: CliDeps): Command {
  const command = new Command("generate")
    .description("generate a track from text, a preset or both")
    .argument("[text...]", "free-form description of the track")
    .option("--preset <name>", "start from a saved preset")

  addTrackOptions(command)

  return command
    .option("--seed <n>", "seed for reproducible output", parseNumber)
    .option("--samples <n>", "number of clips to generate (1-4)", parseNumber)
    .addOption(new Option("--mode <mode>", "generation backend").choices(generationModes))
    .option("--project <id>", "GCP project id (vertex mode)")
    .option("--location <region>", "GCP region (vertex mode)")
    .option("--model <name>", "model name (vertex mode)")
    .option("--output <dir>", "directory for the generated WAV files")
    .option("--json", "print the result as JSON")
    .action(async (text: string[], flags: GenerateFlags, cmd: Command) => {
      const request = parseOrThrow(generateRequestSchema, {
        preset: flags.preset,
        text: text.length > 0 ? text.join(" ") : undefined,
        ...trackFieldsFrom(flags),
        seed: flags.seed,
        sampleCount: flags.samples,
        mode: flags.mode,
        projectId: flags.project,
        location: flags.location,
        model: flags.model,
      })

      await withContext(deps, cmd, async (ctx) => {
        const generation = ctx.services.domains.generation
        const result = await generation.trackGenerator.generate(toGenerateInput(request))
        const files = await saveClips(result, flags.output ?? generation.outputDir)

        if (flags.json) {
          const { clips: _clips, ...summary } = result
          deps.out.write(`${JSON.stringify({ ...summary, files }, null, 2)}\n`)
        } else {
          deps.out.write(`${formatGeneration(result, files)}\n`)
        }
      })
    })
}
