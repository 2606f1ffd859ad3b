import { BaseError } from "../base-error"

class PresetLikeError extends BaseError<"preset_missing" | "preset_broken"> {
  static missing(name: string): PresetLikeError {
    return new PresetLikeError(`Preset "${name}" is missing`, {
      code: "preset_missing",
      context: { name },
    })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-01T12:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults", () => {
      const err = new BaseError("boom", { code: "boom" })

      expect(err.message).toBe("boom")
      expect(err.code).toBe("boom")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2025-03-01T12:00:00.000Z"))
      expect(err.cause).toBeUndefined()
    })

    it("keeps explicit options", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("upstream failed", {
        code: "upstream_failed",
        context: { attempt: 2 },
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.context).toEqual({ attempt: 2 })
      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { name: "lofi" }
      const err = new BaseError("x", { code: "x", context })

      context.name = "rock"

      expect(Object.isFrozen(err.context)).toBe(true)
      expect(err.context).toEqual({ name: "lofi" })
    })
  })

  describe("subclasses", () => {
    it("take the subclass name and keep instanceof", () => {
      const err = PresetLikeError.missing("lofi")

      expect(err.name).toBe("PresetLikeError")
      expect(err).toBeInstanceOf(PresetLikeError)
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("PresetLikeError")
    })

    it("narrow the code union", () => {
      const code: "preset_missing" | "preset_broken" = PresetLikeError.missing("a").code

      expect(code).toBe("preset_missing")
    })
  })

  describe("toJSON", () => {
    it("serializes through JSON.stringify", () => {
      const err = PresetLikeError.missing("lofi")

      expect(JSON.parse(JSON.stringify(err))).toEqual({
        name: "PresetLikeError",
        code: "preset_missing",
        message: 'Preset "lofi" is missing',
        context: { name: "lofi" },
        isOperational: true,
        isRetryable: false,
        timestamp: "2025-03-01T12:00:00.000Z",
      })
    })
  })
})
