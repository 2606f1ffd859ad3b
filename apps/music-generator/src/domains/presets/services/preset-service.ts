import {
  type MetadataCache,
  RecordNotFoundError,
  type RecordStore,
  type SeedResult,
  seedMissing,
} from "@tunesmith/cache"
import type { TimeSource } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import { z } from "zod/mini"
import { PresetError } from "../model/preset.errors"
import {
  type Preset,
  type PresetDefinition,
  type PresetInput,
  type PresetName,
  type PresetSummary,
  presetDefinitionSchema,
  presetName,
} from "../model/preset.model"

export type PresetServiceDeps = {
  /** Writes must invalidate `summaries`; see `InvalidatingRecordStore`. */
  store: RecordStore<PresetName, Preset>
  summaries: MetadataCache<PresetName, PresetSummary>
  clock: TimeSource
  logger: Logger
  loadBuiltins: () => Promise<readonly PresetDefinition[]>
}

export type SavePresetResult = {
  preset: Preset
  created: boolean
}

export class PresetService {
  private readonly logger: Logger

  constructor(private readonly deps: PresetServiceDeps) {
    this.logger = deps.logger.child({ module: "presets" })
  }

  list(): Promise<PresetSummary[]> {
    return this.deps.summaries.list()
  }

  /**
   * @throws {PresetError} `preset_not_found`
   */
  async get(name: PresetName): Promise<Preset> {
    const preset = await this.deps.store.load(name)

    if (!preset) throw PresetError.notFound(name)

    return preset
  }

  /**
   * @throws {PresetError} `preset_not_found`
   */
  async getSummary(name: PresetName): Promise<PresetSummary> {
    try {
      return await this.deps.summaries.get(name)
    } catch (err) {
      if (err instanceof RecordNotFoundError) throw PresetError.notFound(name)
      throw err
    }
  }

  /**
   * Create or replace a preset. Replacing keeps the original `createdAt`.
   *
   * @throws {PresetError} `invalid_preset` when `input` fails validation
   */
  async save(input: PresetInput): Promise<SavePresetResult> {
    const result = z.safeParse(presetDefinitionSchema, input)

    if (!result.success) {
      throw PresetError.fromIssues(input.name, result.error.issues)
    }

    const existing = await this.deps.store.load(result.data.name)
    const now = this.deps.clock.now().toISOString()

    const preset: Preset = {
      ...result.data,
      builtin: false,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    }

    await this.deps.store.save(preset)

    this.logger.info(existing ? "Preset updated" : "Preset created", { preset: preset.name })

    return { preset, created: existing === null }
  }

  /**
   * @throws {PresetError} `preset_not_found`
   */
  async delete(name: PresetName): Promise<void> {
    if ((await this.deps.store.load(name)) === null) throw PresetError.notFound(name)

    await this.deps.store.delete(name)

    this.logger.info("Preset deleted", { preset: name })
  }

  /** Save each builtin preset that is not already stored. */
  async seedDefaults(): Promise<SeedResult<PresetName>> {
    const now = this.deps.clock.now().toISOString()
    const builtins = await this.deps.loadBuiltins()

    const candidates = builtins.map(
      (definition): Preset => ({
        ...definition,
        builtin: true,
        createdAt: now,
        updatedAt: now,
      }),
    )

    const result = await seedMissing(this.deps.store, candidates, presetName)

    this.logger.info("Builtin presets seeded", {
      seeded: result.seeded.length,
      skipped: result.skipped.length,
    })

    return result
  }
}
