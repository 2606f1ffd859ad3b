import type { Command } from "commander"

export type TrackFlagValues = {
  genre?: string
  mood?: string
  tempo?: number
  instrument?: string[]
  duration?: number
  negative?: string
  section?: string[]
}

export function parseNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value)
}

export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value]
}

/** `--section "chorus:full band"` becomes `{ name: "chorus", description: "full band" }`. */
export function parseSection(value: string): { name: string; description?: string } {
  const at = value.indexOf(":")

  if (at === -1) return { name: value.trim() }

  const name = value.slice(0, at).trim()
  const description = value.slice(at + 1).trim()

  return description ? { name, description } : { name }
}

export function addTrackOptions(command: Command): Command {
  return command
    .option("--genre <genre>", "musical genre")
    .option("--mood <mood>", "mood of the track")
    .option("--tempo <bpm>", "tempo in beats per minute", parseNumber)
    .option("--instrument <name>", "instrument to feature (repeatable)", collect)
    .option("--duration <seconds>", "track duration in seconds", parseNumber)
    .option("--section <name[:description]>", "song section, in order (repeatable)", collect)
    .option("--negative <text>", "what the model should avoid")
}

/** Flag values as track fields. Flags that were not given stay undefined. */
export function trackFieldsFrom(flags: TrackFlagValues) {
  return {
    genre: flags.genre,
    mood: flags.mood,
    tempoBpm: flags.tempo,
    instruments: flags.instrument,
    durationSeconds: flags.duration,
    structure: flags.section?.map(parseSection),
    negativePrompt: flags.negative,
  }
}
