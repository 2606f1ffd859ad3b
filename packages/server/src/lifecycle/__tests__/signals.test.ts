import { EventEmitter } from "node:events"
import type { Mock } from "vitest"
import { RecordingLogger } from "../../tests/recording-logger"
import type { StopResult } from "../shutdown"
import { type SignalHandlerContext, setupProcessHandlers } from "../signals"

const okResult: StopResult = { ok: true, failures: [], timedOut: false }

describe("setupProcessHandlers", () => {
  let events: EventEmitter
  let logger: RecordingLogger
  let exit: Mock<(code: number) => void>

  beforeEach(() => {
    events = new EventEmitter()
    logger = new RecordingLogger()
    exit = vi.fn<(code: number) => void>()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function setup(overrides: Partial<SignalHandlerContext> = {}) {
    return setupProcessHandlers({ logger, events, exit, ...overrides })
  }

  it("registers and unregisters its listeners", () => {
    const handler = setup()

    expect(events.eventNames()).toStrictEqual([
      "SIGINT",
      "SIGTERM",
      "uncaughtException",
      "unhandledRejection",
    ])

    handler.unregister()

    expect(events.eventNames()).toStrictEqual([])
  })

  it("stops once on SIGTERM, however many signals arrive", async () => {
    const stop = vi.fn(async () => okResult)
    setup({ stop })

    events.emit("SIGTERM")
    events.emit("SIGINT")
    await vi.waitFor(() => expect(logger.messages()).toContain("Shutdown triggered"))

    expect(stop).toHaveBeenCalledOnce()
    expect(exit).not.toHaveBeenCalled()
  })

  it("logs a shutdown that completed with issues", async () => {
    const stop = vi.fn(async () => ({ ok: false, failures: [{ hook: "x", error: "e" }], timedOut: true }))
    setup({ stop })

    events.emit("SIGINT")

    await vi.waitFor(() =>
      expect(logger.find("Shutdown completed with issues")?.meta).toStrictEqual({
        reason: "SIGINT",
        failureCount: 1,
        timedOut: true,
      }),
    )
  })

  it("logs a rejected stop instead of rethrowing", async () => {
    const failure = new Error("close failed")
    setup({
      stop: async () => {
        throw failure
      },
    })

    events.emit("SIGTERM")

    await vi.waitFor(() =>
      expect(logger.find("Shutdown failed")?.meta).toStrictEqual({ reason: "SIGTERM", err: failure }),
    )
  })

  it("stops and exits with 1 on an uncaught exception", async () => {
    const stop = vi.fn(async () => okResult)
    setup({ stop })

    events.emit("uncaughtException", new Error("bug"))

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1))
    expect(stop).toHaveBeenCalledOnce()
  })

  it("forces exit when stop outlives the fatal timeout", async () => {
    vi.useFakeTimers()
    setup({ stop: () => new Promise<StopResult>(() => {}), fatalTimeoutMs: 5_000 })

    events.emit("unhandledRejection", new Error("lost promise"))

    await vi.advanceTimersByTimeAsync(4_999)
    expect(exit).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(1)
    expect(exit).toHaveBeenCalledWith(1)
  })

  it("exits immediately on a fatal error during shutdown", () => {
    setup({ stop: () => new Promise<StopResult>(() => {}) })

    events.emit("SIGTERM")
    events.emit("uncaughtException", new Error("during shutdown"))

    expect(exit).toHaveBeenCalledWith(1)
    expect(logger.messages("fatal")).toStrictEqual(["Fatal error during shutdown"])
  })
})
