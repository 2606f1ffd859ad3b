import { Config } from "../config"

describe("Config", () => {
  const config = new Config(
    { SERVER_PORT: 9000, LOG_PRETTY: false, GCP_LOCATION: "europe-west4" },
    { SERVER_PORT: "env", GCP_LOCATION: "dotenv:.env", STALE_KEY: "env" },
    new Set(["SERVER_PORT", "GCP_LOCATION", "STALE_KEY"]),
  )

  it("returns typed values", () => {
    const port: number = config.get("SERVER_PORT")

    expect(port).toBe(9000)
    expect(config.value.LOG_PRETTY).toBe(false)
  })

  it("freezes its value", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("explains where a value came from", () => {
    expect(config.explain("SERVER_PORT")).toBe("env")
    expect(config.explain("GCP_LOCATION")).toBe("dotenv:.env")
    expect(config.explain("LOG_PRETTY")).toBe("default")
  })

  it("lists entries in schema order with their source", () => {
    expect(config.entries()).toEqual([
      { key: "SERVER_PORT", value: 9000, source: "env" },
      { key: "LOG_PRETTY", value: false, source: "default" },
      { key: "GCP_LOCATION", value: "europe-west4", source: "dotenv:.env" },
    ])
  })

  it("reports the sources that supplied schema keys", () => {
    expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env"])
  })

  it("reports keys outside the schema", () => {
    expect(config.unknownKeys()).toEqual(["STALE_KEY"])
  })
})
