import { BaseError } from "@tunesmith/errors"
import { createErrorFormatter } from "../error-formatter"

class PresetError extends BaseError<"preset_not_found" | "preset_locked"> {}

describe("createErrorFormatter", () => {
  const format = createErrorFormatter({
    mappings: {
      preset_not_found: { status: 404, message: "Preset not found" },
    },
    transformContext: (error) => ({ details: error.context }),
  })

  it("uses the mapped status and message for a mapped code", () => {
    const err = new PresetError("Preset \"lofi\" not found", {
      code: "preset_not_found",
      context: { name: "lofi" },
    })

    expect(format(err, "req-1")).toStrictEqual({
      error: {
        details: { name: "lofi" },
        code: "preset_not_found",
        status: 404,
        message: "Preset not found",
        requestId: "req-1",
      },
    })
  })

  it("keeps the code of an unmapped application error but hides its message", () => {
    const err = new PresetError("internal detail", {
      code: "preset_locked",
      context: { path: "/secret" },
    })

    expect(format(err, "req-2")).toStrictEqual({
      error: {
        code: "preset_locked",
        status: 500,
        message: "An unexpected error occurred",
        requestId: "req-2",
      },
    })
  })

  it("uses the fallback for anything else", () => {
    expect(format(new TypeError("x is undefined"), "req-3")).toStrictEqual({
      error: {
        code: "internal_error",
        status: 500,
        message: "An unexpected error occurred",
        requestId: "req-3",
      },
    })
  })

  it("honours a custom fallback", () => {
    const custom = createErrorFormatter({
      mappings: {},
      fallback: { code: "upstream_error", status: 502, message: "Upstream failed" },
    })

    expect(custom("boom", "req-4").error).toStrictEqual({
      code: "upstream_error",
      status: 502,
      message: "Upstream failed",
      requestId: "req-4",
    })
  })
})
