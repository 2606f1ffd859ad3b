import { Command } from "commander"
import { serializePreset } from "../../domains/presets/infra/yaml-preset-store"
import type { Preset, PresetInput } from "../../domains/presets/model/preset.model"
import type { CliDeps } from "../cli-deps"
import { formatPresetTable } from "../output"
import { addTrackOptions, type TrackFlagValues, trackFieldsFrom } from "../track-options"
import { withContext } from "../with-context"

type JsonFlag = { json?: boolean }

type SaveFlags = TrackFlagValues & { description?: string }

/** Flags given on the command line replace the existing preset's values; the rest are kept. */
export function mergePresetInput(
  name: string,
  existing: Preset | null,
  flags: SaveFlags,
): PresetInput {
  const fields = trackFieldsFrom(flags)

  return {
    name,
    description: flags.description ?? existing?.description,
    genre: fields.genre ?? existing?.genre ?? "",
    mood: fields.mood ?? existing?.mood,
    tempoBpm: fields.tempoBpm ?? existing?.tempoBpm,
    instruments: fields.instruments ?? existing?.instruments,
    durationSeconds: fields.durationSeconds ?? existing?.durationSeconds,
    structure: fields.structure ?? existing?.structure,
    negativePrompt: fields.negativePrompt ?? existing?.negativePrompt,
  }
}

export function createPresetsCommand(deps: CliDeps): Command {
  const presets = new Command("presets").description("manage saved presets")

  presets
    .command("list")
    .description("list saved presets")
    .option("--json", "print as JSON")
    .action(async (flags: JsonFlag, cmd: Command) => {
      await withContext(deps, cmd, async (ctx) => {
        const summaries = await ctx.services.domains.presets.presetService.list()

        deps.out.write(
          flags.json
            ? `${JSON.stringify(summaries, null, 2)}\n`
            : `${formatPresetTable(summaries)}\n`,
        )
      })
    })

  presets
    .command("show")
    .description("print a preset")
    .argument("<name>", "preset name")
    .option("--json", "print as JSON instead of YAML")
    .action(async (name: string, flags: JsonFlag, cmd: Command) => {
      await withContext(deps, cmd, async (ctx) => {
        const preset = await ctx.services.domains.presets.presetService.get(name)

        deps.out.write(
          flags.json ? `${JSON.stringify(preset, null, 2)}\n` : serializePreset(preset),
        )
      })
    })

  addTrackOptions(
    presets
      .command("save")
      .description("create a preset, or update the given fields of an existing one")
      .argument("<name>", "preset name")
      .option("--description <text>", "short description"),
  ).action(async (name: string, flags: SaveFlags, cmd: Command) => {
    await withContext(deps, cmd, async (ctx) => {
      const services = ctx.services.domains.presets
      const existing = await services.presetStore.load(name)
      const { preset, created } = await services.presetService.save(
        mergePresetInput(name, existing, flags),
      )

      deps.out.write(`${created ? "Created" : "Updated"} preset ${preset.name}\n`)
    })
  })

  presets
    .command("delete")
    .description("delete a preset")
    .argument("<name>", "preset name")
    .action(async (name: string, _flags: unknown, cmd: Command) => {
      await withContext(deps, cmd, async (ctx) => {
        await ctx.services.domains.presets.presetService.delete(name)

        deps.out.write(`Deleted preset ${name}\n`)
      })
    })

  presets
    .command("seed")
    .description("save the builtin presets that are missing")
    .action(async (_flags: unknown, cmd: Command) => {
      await withContext(deps, cmd, async (ctx) => {
        const result = await ctx.services.domains.presets.presetService.seedDefaults()

        deps.out.write(
          [
            `Seeded: ${result.seeded.join(", ") || "none"}`,
            `Skipped: ${result.skipped.join(", ") || "none"}`,
          ].join("\n") + "\n",
        )
      })
    })

  return presets
}
