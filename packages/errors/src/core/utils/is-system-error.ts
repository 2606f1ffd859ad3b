/**
 * Narrows Node's errno-style errors, e.g. `isSystemError(err, "ENOENT")`.
 */
export function isSystemError(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && err.code === code
}
