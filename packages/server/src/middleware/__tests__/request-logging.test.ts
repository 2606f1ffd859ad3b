import { FakeClock } from "@tunesmith/clock"
import { Hono } from "hono"
import { RecordingLogger } from "../../tests/recording-logger"
import { requestIdMiddleware } from "../request-id"
import { requestLoggerMiddleware } from "../request-logger"
import { requestLoggingMiddleware } from "../request-logging"

function setup() {
  const logger = new RecordingLogger()
  const clock = new FakeClock(0)
  const app = new Hono()

  app.use("*", requestIdMiddleware({ enabled: true, header: "x-request-id", generate: () => "req-1" }))
  app.use("*", requestLoggerMiddleware(logger))
  app.use(
    "*",
    requestLoggingMiddleware({ enabled: true, level: "info", ignorePaths: ["/health"] }, logger, clock),
  )

  app.get("/presets/:name", (c) => {
    clock.advance(42)
    c.get("logger").debug("Handling", { preset: c.req.param("name") })
    return c.json({ name: c.req.param("name") })
  })
  app.get("/broken", (c) => c.json({ error: "x" }, 503))
  app.get("/health", (c) => c.json({ ok: true }))

  return { app, logger }
}

describe("request logging", () => {
  it("logs one completed line with route, status and duration", async () => {
    const { app, logger } = setup()

    await app.request("/presets/lofi", { headers: { "user-agent": "test-agent" } })

    const entry = logger.find("Request completed")
    expect(entry?.level).toBe("info")
    expect(entry?.meta).toStrictEqual({
      requestId: "req-1",
      method: "GET",
      path: "/presets/lofi",
      route: "/presets/:name",
      op: "GET /presets/:name",
      status: 200,
      durationMs: 42,
      userAgent: "test-agent",
    })
  })

  it("binds the request id to the per-request logger", async () => {
    const { app, logger } = setup()

    await app.request("/presets/lofi")

    expect(logger.find("Handling")?.context).toStrictEqual({ requestId: "req-1" })
  })

  it("logs 5xx responses at error", async () => {
    const { app, logger } = setup()

    await app.request("/broken")

    expect(logger.find("Request completed")?.level).toBe("error")
  })

  it("skips ignored paths", async () => {
    const { app, logger } = setup()

    await app.request("/health")

    expect(logger.find("Request completed")).toBeUndefined()
  })
})
