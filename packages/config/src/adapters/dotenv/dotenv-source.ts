import fs from "node:fs/promises"
import path from "node:path"
import { isSystemError } from "@tunesmith/errors"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.test"
   */
  file: string

  /** Throw when the file is missing instead of contributing nothing. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return parse(await fs.readFile(filePath, "utf-8"))
    } catch (err) {
      if (!this.opts.required && isSystemError(err, "ENOENT")) return {}

      throw err
    }
  }
}
