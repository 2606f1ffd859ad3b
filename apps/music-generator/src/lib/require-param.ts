import { type Context, ValidationError } from "@tunesmith/server"

export function requireParam(c: Context, key: string): string {
  const value: string | undefined = c.req.param(key)

  if (value === undefined || value === "") {
    throw new ValidationError([{ path: key, message: `Missing path parameter "${key}"` }])
  }

  return value
}
