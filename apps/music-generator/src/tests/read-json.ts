/** Response body typed for assertions. */
export function readJson<T>(res: Response): Promise<T> {
  return res.json() as Promise<T>
}
