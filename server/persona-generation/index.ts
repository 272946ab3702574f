export type { GeneratedPersona, GeneratedPersonaOutline, PersonaGenerationMode } from "./types";
export { generatedPersonaSchema, personaOutlineSchema } from "./types";
export { generatePersonas, reflectPersonas } from "./generator";
export { validatePersonaBatch, buildCorrectionPrompt } from "./validation";
export type { ValidationResult } from "./validation";
