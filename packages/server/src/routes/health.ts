import type { Application } from "../server/app"
import type { ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, 200, NO_CACHE_HEADERS))

  app.get(config.readinessPath, (c) =>
    isReady()
      ? c.json({ ok: true }, 200, NO_CACHE_HEADERS)
      : c.json({ ok: false, reason: "not_ready" }, 503, NO_CACHE_HEADERS),
  )
}
