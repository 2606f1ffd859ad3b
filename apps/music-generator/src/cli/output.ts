import type { ConfigEntry } from "@tunesmith/config"
import { describeErrorChain } from "@tunesmith/errors"
import { isValidationError } from "@tunesmith/server"
import type { GenerationResult } from "../domains/generation/model/track.model"
import type { PresetSummary } from "../domains/presets/model/preset.model"

function padEnd(rows: string[][]): string[] {
  const widths: number[] = []

  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length)
    })
  }

  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join("  ")
      .trimEnd(),
  )
}

export function formatPresetTable(presets: readonly PresetSummary[]): string {
  if (presets.length === 0) return "No presets found."

  const rows = presets.map((p) => [
    p.name,
    p.genre,
    p.tempoBpm === undefined ? "-" : `${p.tempoBpm} bpm`,
    p.description,
  ])

  return padEnd([["NAME", "GENRE", "TEMPO", "DESCRIPTION"], ...rows]).join("\n")
}

export function formatGeneration(result: GenerationResult, files: readonly string[]): string {
  return [
    `Generated track ${result.id} (${result.mode}/${result.model}) in ${result.elapsedMs} ms`,
    "Prompt:",
    ...result.prompt.split("\n").map((line) => `  ${line}`),
    "Saved:",
    ...files.map((file) => `  ${file}`),
  ].join("\n")
}

export function formatConfigEntries(entries: readonly ConfigEntry[]): string {
  const rows = entries.map((e) => [
    e.key,
    e.value === undefined ? "" : String(e.value),
    `(${e.source})`,
  ])

  return padEnd(rows).join("\n")
}

/** `error: <message>`, then validation issues and the cause chain, one per line. */
export function formatError(err: unknown): string {
  const [first = "unknown error", ...causes] = describeErrorChain(err)
  const message = err instanceof Error ? err.message : first

  const issues = isValidationError(err)
    ? err.issues.map((i) => `  ${i.path || "(input)"}: ${i.message}`)
    : []

  return [`error: ${message}`, ...issues, ...causes.map((c) => `  ${c}`)].join("\n")
}
