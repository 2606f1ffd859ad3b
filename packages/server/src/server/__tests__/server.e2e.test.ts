import net from "node:net"
import { SystemClock } from "@tunesmith/clock"
import { createNullLogger } from "@tunesmith/logger"
import type { ServerHandle } from "../../lifecycle/create-stopper"
import { createServer, type Server } from "../server"

async function getFreePort(): Promise<number> {
  return await new Promise((resolve, reject) => {
    const srv = net.createServer()
    srv.on("error", reject)
    srv.listen(0, "127.0.0.1", () => {
      const addr = srv.address()
      if (!addr || typeof addr === "string") return reject(new Error("bad addr"))
      const port = addr.port
      srv.close(() => resolve(port))
    })
  })
}

describe("server (e2e)", () => {
  let server: Server
  let handle: ServerHandle
  let baseUrl: string
  const stopped = vi.fn(async () => {})

  beforeAll(async () => {
    server = createServer(
      { logger: createNullLogger(), clock: new SystemClock() },
      {
        host: "127.0.0.1",
        port: await getFreePort(),
        shutdownTimeoutMs: 5_000,
        errorMappings: { mappings: {} },
        routes: (app) => {
          app.get("/hello", (c) => c.json({ hello: "world" }))
        },
        stopHooks: [{ name: "record", fn: stopped }],
      },
    )

    handle = await server.start()
    baseUrl = `http://${handle.address.host}:${handle.address.port}`
  })

  afterAll(async () => {
    await handle.stop()
  })

  it("serves health, readiness and routes over HTTP", async () => {
    const [health, ready, hello] = await Promise.all([
      fetch(`${baseUrl}/health`),
      fetch(`${baseUrl}/ready`),
      fetch(`${baseUrl}/hello`),
    ])

    expect([health.status, ready.status, hello.status]).toStrictEqual([200, 200, 200])
    await expect(hello.json()).resolves.toStrictEqual({ hello: "world" })
    expect(server.getState()).toBe("started")
  })

  it("refuses a second start", async () => {
    await expect(server.start()).rejects.toThrow("Server already started")
  })

  it("stops once and runs stop hooks", async () => {
    const first = await handle.stop()
    const second = await handle.stop()

    expect(first).toStrictEqual({ ok: true, failures: [], timedOut: false })
    expect(second).toBe(first)
    expect(stopped).toHaveBeenCalledOnce()
    expect(server.isReady()).toBe(false)
  })
})
