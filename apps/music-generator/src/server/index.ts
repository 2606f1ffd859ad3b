export { type BuiltServer, buildServer } from "./build-server"
export { errorMappings } from "./error-mappings"
export { run } from "./run"
