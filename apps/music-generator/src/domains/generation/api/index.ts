import type { Application } from "@tunesmith/server"
import type { ApiModule } from "../../../app/routes"
import type { GenerationServices } from "../composition"
import { generateHandler } from "./generate.handler"

type GenerationModuleDeps = {
  generation: GenerationServices
}

export function createGenerationModule(deps: GenerationModuleDeps): ApiModule {
  return {
    name: "generation",
    register: (api: Application) => {
      api.post("/generate", generateHandler(deps.generation))
    },
  }
}
