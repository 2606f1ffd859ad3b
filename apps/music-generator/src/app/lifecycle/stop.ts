import type { LifecycleHook } from "@tunesmith/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:generation:clients",
      fn: async () => {
        context.services.domains.generation.clientCache.clear()
      },
    },
    {
      name: "stop:presets:summaries",
      fn: async () => {
        context.services.domains.presets.presetSummaries.invalidateAll()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
