export { SimulationRegistry } from "./registry";
export type { SimulationRegistryOptions } from "./registry";
export { SimulationController, canTransition } from "./controller";
export { ProgressTracker, PROGRESS_BANDS, bandPercentage } from "./progress";
export { runConversation } from "./driver";
export { evaluateTurnFlow } from "./turn-flow";
export { CLOSING_SIGNAL, parsePersonaReply } from "./persona-prompt";
export { SIMULATION_LIMITS } from "./types";
export type { DriverContext, DriverResult, SimulationRuntimeConfig } from "./types";
