export { type CreateStartHooksFn, createStartHooks } from "./start"
export { type CreateStopHooksFn, createStopHooks } from "./stop"
