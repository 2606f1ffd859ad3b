import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { catchError } from "../../../../tests/catch-error"
import { parsePresetDocument, serializePreset, YamlPresetStore } from "../yaml-preset-store"
import { makePreset } from "./preset-store.contract"

const TIMESTAMPS = 'createdAt: "2026-01-01T00:00:00.000Z"\nupdatedAt: "2026-01-01T00:00:00.000Z"\n'

const tmpDirs: string[] = []

async function makeTmpDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "presets-"))
  tmpDirs.push(dir)
  return dir
}

afterEach(async () => {
  await Promise.all(tmpDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })))
})

describe("YamlPresetStore behavior", () => {
  it("lists nothing when the directory does not exist", async () => {
    const store = new YamlPresetStore({ dir: path.join(await makeTmpDir(), "absent") })

    await expect(store.enumerateIds()).resolves.toEqual([])
  })

  it("writes one YAML file per preset", async () => {
    const dir = await makeTmpDir()
    const store = new YamlPresetStore({ dir })

    await store.save(makePreset("rock"))

    await expect(fs.readdir(dir)).resolves.toEqual(["rock.yaml"])
  })

  it("reads .yml files and takes the name from the file", async () => {
    const dir = await makeTmpDir()
    await fs.writeFile(path.join(dir, "jazz.yml"), `genre: jazz\n${TIMESTAMPS}`)
    const store = new YamlPresetStore({ dir })

    await expect(store.enumerateIds()).resolves.toEqual(["jazz"])
    await expect(store.load("jazz")).resolves.toEqual({
      name: "jazz",
      description: "",
      genre: "jazz",
      instruments: [],
      durationSeconds: 30,
      structure: [],
      builtin: false,
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    })
  })

  it("prefers .yaml over .yml for the same name", async () => {
    const dir = await makeTmpDir()
    await fs.writeFile(path.join(dir, "jazz.yml"), `genre: old jazz\n${TIMESTAMPS}`)
    await fs.writeFile(path.join(dir, "jazz.yaml"), `genre: new jazz\n${TIMESTAMPS}`)
    const store = new YamlPresetStore({ dir })

    await expect(store.enumerateIds()).resolves.toEqual(["jazz"])
    await expect(store.load("jazz")).resolves.toMatchObject({ genre: "new jazz" })
  })

  it("removes both extensions on delete", async () => {
    const dir = await makeTmpDir()
    await fs.writeFile(path.join(dir, "jazz.yml"), `genre: jazz\n${TIMESTAMPS}`)
    await fs.writeFile(path.join(dir, "jazz.yaml"), `genre: jazz\n${TIMESTAMPS}`)
    const store = new YamlPresetStore({ dir })

    await store.delete("jazz")

    await expect(fs.readdir(dir)).resolves.toEqual([])
  })

  it("skips other files and names that are not valid preset names", async () => {
    const dir = await makeTmpDir()
    await fs.writeFile(path.join(dir, "notes.txt"), "hello")
    await fs.writeFile(path.join(dir, "Bad Name.yaml"), `genre: rock\n${TIMESTAMPS}`)
    const store = new YamlPresetStore({ dir })

    await expect(store.enumerateIds()).resolves.toEqual([])
  })

  it("never resolves a name outside its directory", async () => {
    const root = await makeTmpDir()
    await fs.writeFile(path.join(root, "secret.yaml"), `genre: rock\n${TIMESTAMPS}`)
    const store = new YamlPresetStore({ dir: path.join(root, "presets") })

    await expect(store.load("../secret")).resolves.toBeNull()
  })
})

describe("parsePresetDocument", () => {
  it("rejects malformed YAML", () => {
    const err = catchError(() => parsePresetDocument("rock", "genre: [unclosed"))

    expect(err).toMatchObject({ code: "invalid_preset", context: { name: "rock" } })
  })

  it("rejects a document that is not a mapping", () => {
    const err = catchError(() => parsePresetDocument("rock", "- a\n- b\n"))

    expect(err).toMatchObject({
      code: "invalid_preset",
      message: 'Invalid preset "rock": Expected a YAML mapping',
    })
  })

  it("reports field errors with their paths", () => {
    const err = catchError(() =>
      parsePresetDocument("rock", `genre: rock\ntempoBpm: 500\n${TIMESTAMPS}`),
    )

    expect(err).toMatchObject({
      code: "invalid_preset",
      message: 'Invalid preset "rock": tempoBpm: Tempo cannot exceed 300 BPM',
    })
  })

  it("rejects a name that differs from the file name", () => {
    const err = catchError(() =>
      parsePresetDocument("rock", `name: jazz\ngenre: jazz\n${TIMESTAMPS}`),
    )

    expect(err).toMatchObject({
      code: "invalid_preset",
      message: 'Invalid preset "rock": name: Does not match file name "rock"',
    })
  })

  it("reads back what serializePreset writes", () => {
    const preset = makePreset("lofi", { mood: "calm", tempoBpm: 80 })

    expect(parsePresetDocument("lofi", serializePreset(preset))).toEqual(preset)
  })
})
