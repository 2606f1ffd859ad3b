import { type Context, ValidationError } from "@tunesmith/server"

/**
 * Parsed JSON request body. An empty body reads as `{}`.
 *
 * @throws {ValidationError} when the body is not valid JSON
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text()

  if (text.trim() === "") return {}

  try {
    return JSON.parse(text)
  } catch {
    throw new ValidationError([{ path: "", message: "Request body must be valid JSON" }])
  }
}
