import { BaseError } from "../../base-error"
import { describeErrorChain } from "../describe-error-chain"
import { errorChain } from "../error-chain"

describe("errorChain", () => {
  it("lists the error and its causes, outermost first", () => {
    const root = new Error("root")
    const middle = new BaseError("middle", { code: "middle", cause: root })
    const outer = new Error("outer", { cause: middle })

    expect(errorChain(outer)).toEqual([outer, middle, root])
  })

  it("includes non-error causes", () => {
    const outer = new Error("outer", { cause: "disk full" })

    expect(errorChain(outer)).toEqual([outer, "disk full"])
  })

  it("stops at a cycle", () => {
    const a = new Error("a")
    const b = new Error("b", { cause: a })
    Object.defineProperty(a, "cause", { value: b })

    expect(errorChain(b)).toEqual([b, a])
  })

  it("honours maxDepth", () => {
    const chainOf = (n: number): Error =>
      n === 0 ? new Error("leaf") : new Error(`level ${n}`, { cause: chainOf(n - 1) })

    expect(errorChain(chainOf(10), 3)).toHaveLength(3)
  })

  it("returns an empty list for null and undefined", () => {
    expect(errorChain(null)).toEqual([])
    expect(errorChain(undefined)).toEqual([])
  })
})

describe("describeErrorChain", () => {
  it("renders one line per link", () => {
    const root = new TypeError("fetch failed")
    const err = new BaseError("Generation request failed", {
      code: "generation_failed",
      cause: root,
    })

    expect(describeErrorChain(err)).toEqual([
      "Generation request failed [generation_failed]",
      "caused by: TypeError: fetch failed",
    ])
  })

  it("renders thrown strings as-is", () => {
    expect(describeErrorChain("nope")).toEqual(["nope"])
  })
})
