import { errorChain } from "./error-chain"
import { isAppError } from "./is-app-error"

function describeOne(err: unknown): string {
  if (isAppError(err)) return `${err.message} [${err.code}]`
  if (err instanceof Error) return `${err.name}: ${err.message}`

  return String(err)
}

/**
 * Human-readable lines for an error and its causes.
 *
 * @example
 * ```ts
 * describeErrorChain(err)
 * // [
 * //   'Generation request failed [generation_failed]',
 * //   'caused by: Error: socket hang up',
 * // ]
 * ```
 */
export function describeErrorChain(err: unknown, maxDepth?: number): string[] {
  return errorChain(err, maxDepth).map((e, i) =>
    i === 0 ? describeOne(e) : `caused by: ${describeOne(e)}`,
  )
}
