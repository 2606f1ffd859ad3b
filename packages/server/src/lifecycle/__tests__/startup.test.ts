import { FakeClock } from "@tunesmith/clock"
import { RecordingLogger } from "../../tests/recording-logger"
import { StartupError } from "../startup-error"
import { startup } from "../startup"

describe("startup", () => {
  it("is ok when every hook succeeds", async () => {
    const res = await startup({
      clock: new FakeClock(0),
      logger: new RecordingLogger(),
      deadlineMs: 1_000,
      startHooks: [{ name: "seed", fn: async () => {} }],
    })

    expect(res).toStrictEqual({ ok: true, failures: [], timedOut: false })
  })

  it("fails fast on the first failing hook", async () => {
    const later = vi.fn(async () => {})
    const boom = new Error("boom")

    const res = await startup({
      clock: new FakeClock(0),
      logger: new RecordingLogger(),
      deadlineMs: 1_000,
      startHooks: [
        {
          name: "seed",
          fn: async () => {
            throw boom
          },
        },
        { name: "later", fn: later },
      ],
    })

    expect(res).toStrictEqual({ ok: false, failures: [{ hook: "seed", error: boom }], timedOut: false })
    expect(later).not.toHaveBeenCalled()
  })
})

describe("StartupError", () => {
  it("names the failed hook and keeps its error as cause", () => {
    const boom = new Error("boom")

    const err = StartupError.fromResult({
      ok: false,
      failures: [{ hook: "seed", error: boom }],
      timedOut: false,
    })

    expect(err.message).toBe('Startup hook "seed" failed')
    expect(err.code).toBe("startup_failed")
    expect(err.cause).toBe(boom)
    expect(err.context).toStrictEqual({ failedHooks: ["seed"], timedOut: false })
  })

  it("describes a timeout without failures", () => {
    const err = StartupError.fromResult({ ok: false, failures: [], timedOut: true })

    expect(err.message).toBe("Startup hooks did not finish before the deadline")
    expect(err.cause).toBeUndefined()
  })
})
