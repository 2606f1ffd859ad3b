import { GenerationError } from "../model/generation.errors"
import type { TrackConfig, TrackSection } from "../model/track.model"

function describeSection(section: TrackSection): string {
  return section.description ? `${section.name} (${section.description})` : section.name
}

/**
 * Assemble the model prompt from a track config.
 *
 * Fragments are collected in a fixed order and joined once; absent or empty
 * fields contribute nothing. The negative prompt is sent separately.
 *
 * @throws {GenerationError} `empty_prompt` when there is neither text nor genre
 */
export function buildPrompt(track: TrackConfig): string {
  const text = track.text.trim()
  const genre = track.genre.trim()

  if (!text && !genre) throw GenerationError.emptyPrompt()

  const fragments: string[] = []

  if (text) fragments.push(text)
  if (genre) fragments.push(`Genre: ${genre}`)
  if (track.mood) fragments.push(`Mood: ${track.mood}`)
  if (track.tempoBpm !== undefined) fragments.push(`Tempo: ${track.tempoBpm} BPM`)
  if (track.instruments.length > 0) {
    fragments.push(`Instruments: ${track.instruments.join(", ")}`)
  }
  if (track.structure.length > 0) {
    fragments.push(`Structure: ${track.structure.map(describeSection).join(", ")}`)
  }
  fragments.push(`Duration: ${track.durationSeconds} seconds`)

  return fragments.join("\n")
}
