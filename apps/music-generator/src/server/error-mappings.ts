import type { ErrorMappingsConfig } from "@tunesmith/server"

const ISSUE_CODES = new Set(["validation_error", "invalid_preset"])

export const errorMappings: ErrorMappingsConfig = {
  mappings: {
    validation_error: { status: 422, message: "Request validation failed" },
    invalid_preset: { status: 422, message: "Preset is invalid" },
    preset_not_found: { status: 404, message: "Preset not found" },
    record_not_found: { status: 404, message: "Record not found" },
    empty_prompt: {
      status: 422,
      message: "Prompt is empty: provide text, a genre or a preset",
    },
    invalid_client_config: { status: 400, message: "Invalid generation client configuration" },
    generation_failed: { status: 502, message: "Music generation failed" },
  },

  transformContext: (error) =>
    ISSUE_CODES.has(error.code) && Array.isArray(error.context.issues)
      ? { issues: error.context.issues }
      : undefined,
}
