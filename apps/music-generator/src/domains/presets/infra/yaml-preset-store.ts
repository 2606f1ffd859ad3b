import fs from "node:fs/promises"
import path from "node:path"
import type { RecordStore } from "@tunesmith/cache"
import { isSystemError } from "@tunesmith/errors"
import * as yaml from "js-yaml"
import { z } from "zod/mini"
import { PresetError } from "../model/preset.errors"
import { isPresetName, type Preset, type PresetName, presetSchema } from "../model/preset.model"

const EXTENSIONS = [".yaml", ".yml"] as const

export type YamlPresetStoreOptions = {
  dir: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function parsePresetDocument(name: PresetName, text: string): Preset {
  let raw: unknown

  try {
    raw = yaml.load(text, { schema: yaml.JSON_SCHEMA })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw PresetError.invalid(name, [{ path: "", message }], err)
  }

  if (!isRecord(raw)) {
    throw PresetError.invalid(name, [{ path: "", message: "Expected a YAML mapping" }])
  }

  const result = z.safeParse(presetSchema, { name, ...raw })

  if (!result.success) throw PresetError.fromIssues(name, result.error.issues)

  if (result.data.name !== name) {
    throw PresetError.invalid(name, [
      { path: "name", message: `Does not match file name "${name}"` },
    ])
  }

  return result.data
}

export function serializePreset(preset: Preset): string {
  return yaml.dump(preset, {
    schema: yaml.JSON_SCHEMA,
    noRefs: true,
    lineWidth: 100,
    skipInvalid: true,
  })
}

/**
 * One YAML file per preset, `<dir>/<name>.yaml`. Files ending in `.yml` are
 * read too; `.yaml` wins when both exist.
 */
export class YamlPresetStore implements RecordStore<PresetName, Preset> {
  constructor(private readonly opts: YamlPresetStoreOptions) {}

  async enumerateIds(): Promise<PresetName[]> {
    let files: string[]

    try {
      files = await fs.readdir(this.opts.dir)
    } catch (err) {
      if (isSystemError(err, "ENOENT")) return []
      throw err
    }

    const names = new Set<PresetName>()

    for (const file of files) {
      const ext = path.extname(file)
      const name = path.basename(file, ext)

      if (EXTENSIONS.some((e) => e === ext) && isPresetName(name)) names.add(name)
    }

    return [...names].sort()
  }

  async load(name: PresetName): Promise<Preset | null> {
    if (!isPresetName(name)) return null

    for (const ext of EXTENSIONS) {
      const text = await this.readIfExists(this.fileFor(name, ext))

      if (text !== null) return parsePresetDocument(name, text)
    }

    return null
  }

  async save(preset: Preset): Promise<void> {
    await fs.mkdir(this.opts.dir, { recursive: true })
    await fs.writeFile(this.fileFor(preset.name, ".yaml"), serializePreset(preset), "utf-8")
  }

  async delete(name: PresetName): Promise<void> {
    if (!isPresetName(name)) return

    await Promise.all(EXTENSIONS.map((ext) => fs.rm(this.fileFor(name, ext), { force: true })))
  }

  private fileFor(name: PresetName, ext: (typeof EXTENSIONS)[number]): string {
    return path.join(this.opts.dir, `${name}${ext}`)
  }

  private async readIfExists(file: string): Promise<string | null> {
    try {
      return await fs.readFile(file, "utf-8")
    } catch (err) {
      if (isSystemError(err, "ENOENT")) return null
      throw err
    }
  }
}
