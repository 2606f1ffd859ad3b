import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { loadAppConfig, loadRawConfig } from "../load-app-config"

describe("loadAppConfig", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "config-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("applies defaults and resolves directories against cwd", async () => {
    const config = await loadAppConfig({}, { cwd: dir })

    expect(config).toEqual({
      app: { env: "development" },
      server: { host: "0.0.0.0", port: 8080, shutdownTimeoutMs: 10_000 },
      logging: { level: "info", prettify: false, serviceName: "Music Track Generator" },
      requestId: { header: "x-request-id" },
      requestLogging: { enabled: true },
      presets: { dir: path.join(dir, "presets"), seedOnStart: true },
      generation: {
        mode: "simulate",
        location: "us-central1",
        model: "lyria-002",
        timeoutMs: 120_000,
        outputDir: path.join(dir, "output"),
      },
    })
  })

  it("coerces environment strings", async () => {
    const config = await loadAppConfig(
      {
        SERVER_PORT: "9000",
        LOG_PRETTY: "true",
        PRESETS_SEED_ON_START: "false",
        GENERATION_MODE: "vertex",
        GCP_PROJECT_ID: "demo-project",
        PRESETS_DIR: "/srv/presets",
      },
      { cwd: dir },
    )

    expect(config.server.port).toBe(9000)
    expect(config.logging.prettify).toBe(true)
    expect(config.presets).toEqual({ dir: "/srv/presets", seedOnStart: false })
    expect(config.generation).toMatchObject({ mode: "vertex", projectId: "demo-project" })
  })

  it("layers dotenv files, the environment and CLI values", async () => {
    await fs.writeFile(
      path.join(dir, ".env"),
      "PRESETS_DIR=from-dotenv\nSERVER_PORT=7000\nLOG_LEVEL=debug\nGCP_LOCATION=europe-west4\n",
    )
    await fs.writeFile(path.join(dir, ".env.test"), "SERVER_PORT=7100\nLOG_LEVEL=trace\n")

    const config = await loadAppConfig(
      { NODE_ENV: "test", LOG_LEVEL: "error" },
      { cwd: dir, cliValues: { LOG_LEVEL: "warn", PRESETS_DIR: undefined } },
    )

    expect(config.presets.dir).toBe(path.join(dir, "from-dotenv"))
    expect(config.server.port).toBe(7100)
    expect(config.logging.level).toBe("warn")
    expect(config.generation.location).toBe("europe-west4")
  })

  it("applies typed overrides last", async () => {
    const config = await loadAppConfig(
      { SERVER_PORT: "9000" },
      { cwd: dir, overrides: { server: { port: 0 } } },
    )

    expect(config.server).toEqual({ host: "0.0.0.0", port: 0, shutdownTimeoutMs: 10_000 })
  })

  it("rejects an unknown generation mode", async () => {
    await expect(loadAppConfig({ GENERATION_MODE: "cloud" }, { cwd: dir })).rejects.toMatchObject({
      code: "invalid_config",
      issues: [{ key: "GENERATION_MODE" }],
    })
  })
})

describe("loadRawConfig", () => {
  it("reports where each value came from", async () => {
    const config = await loadRawConfig(
      { SERVER_PORT: "9000" },
      { cwd: path.join(os.tmpdir(), "no-such-config-dir"), cliValues: { LOG_LEVEL: "debug" } },
    )

    const bySource = new Map(config.entries().map((e) => [e.key, e.source]))

    expect(bySource.get("SERVER_PORT")).toBe("env")
    expect(bySource.get("LOG_LEVEL")).toBe("object:cli")
    expect(bySource.get("SERVICE_NAME")).toBe("default")
  })
})
