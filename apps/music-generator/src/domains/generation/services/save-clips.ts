import fs from "node:fs/promises"
import path from "node:path"
import type { GenerationResult } from "../model/track.model"

/** Write each clip to `<dir>/<id>-<n>.wav`, numbered from 1. Returns the paths. */
export async function saveClips(
  result: Pick<GenerationResult, "id" | "clips">,
  dir: string,
): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true })

  const outputs = result.clips.map((clip, i) => ({
    file: path.join(dir, `${result.id}-${i + 1}.wav`),
    data: clip.data,
  }))

  await Promise.all(outputs.map(({ file, data }) => fs.writeFile(file, data)))

  return outputs.map(({ file }) => file)
}
