import type { LifecycleHook } from "@tunesmith/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = []

  if (context.config.presets.seedOnStart) {
    hooks.push({
      name: "start:presets:seed",
      fn: async () => {
        await context.services.domains.presets.presetService.seedDefaults()
      },
    })
  }

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
