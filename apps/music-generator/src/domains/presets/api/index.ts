import { type Application, createRouter } from "@tunesmith/server"
import type { ApiModule } from "../../../app/routes"
import type { PresetServices } from "../composition"
import { deletePresetHandler } from "./delete-preset.handler"
import { getPresetHandler } from "./get-preset.handler"
import { getPresetSummaryHandler } from "./get-preset-summary.handler"
import { listPresetsHandler } from "./list-presets.handler"
import { putPresetHandler } from "./put-preset.handler"

type PresetsModuleDeps = {
  presets: PresetServices
}

export function createPresetsModule(deps: PresetsModuleDeps): ApiModule {
  return {
    name: "presets",
    register: (api: Application) => {
      const presets = createRouter()

      presets.get("/", listPresetsHandler(deps.presets))
      presets.get("/:name", getPresetHandler(deps.presets))
      presets.get("/:name/summary", getPresetSummaryHandler(deps.presets))
      presets.put("/:name", putPresetHandler(deps.presets))
      presets.delete("/:name", deletePresetHandler(deps.presets))

      api.route("/presets", presets)
    },
  }
}
