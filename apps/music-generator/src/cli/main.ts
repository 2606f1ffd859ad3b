#!/usr/bin/env -S npx tsx
import { defaultCliDeps, runCli } from "./program"

runCli(process.argv.slice(2), defaultCliDeps()).then((code) => {
  process.exitCode = code
})
