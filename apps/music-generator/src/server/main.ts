import { describeErrorChain } from "@tunesmith/errors"
import { run } from "./run"

run().catch((err: unknown) => {
  process.stderr.write(`${describeErrorChain(err).join("\n")}\n`)
  process.exitCode = 1
})
