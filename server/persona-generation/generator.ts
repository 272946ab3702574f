import { randomUUID } from "crypto";
import type { ZodType, ZodTypeDef } from "zod";
import type { Persona, PersonaOutline } from "@shared/types/simulation";
import { GatewayError, GenerationError } from "../errors";
import type { LLMUsageAttribution, LLMUseCase } from "../llm-usage";
import type { ModelGateway } from "../model-gateway";
import {
  generatedPersonaSchema,
  personaOutlineSchema,
  PERSONA_JSON_SHAPE,
  OUTLINE_JSON_SHAPE,
  type GeneratedPersona,
  type PersonaGenerationMode,
} from "./types";
import { validatePersonaBatch, buildCorrectionPrompt } from "./validation";

const MAX_ATTEMPTS = 2;

function buildPersonaSystemPrompt(mode: PersonaGenerationMode, count: number): string {
  if (mode === "outline") {
    return `You are an expert in user research and market analysis. Your task is to reflect on which
types of people would be most valuable to interview about the given context.

Consider:
1. Who are the main stakeholders or user groups in this domain?
2. Which personas would give the most diverse and insightful perspectives?
3. Which personas have distinct pain points, challenges, or needs?
4. What combination gives comprehensive coverage of the topic?

OUTPUT:
Return a JSON object with this structure, containing exactly ${count} personas:
${OUTLINE_JSON_SHAPE}`;
  }

  return `You are an expert in creating realistic customer personas for product discovery research.
Generate a diverse batch of detailed personas for potential customers or users in the given context.

DIVERSITY RULES:
1. Vary age, occupation, location and background independently of each other.
2. Do not assign traits based on demographic stereotypes.
3. Each persona must have distinct goals, pain points and motivations grounded in the context.
4. Include specific, realistic details so each persona reads like a real person.

REQUIRED FIELDS:
- name, background: non-empty strings
- goals, painPoints, motivations: non-empty arrays of non-empty strings

OUTPUT:
Return a JSON object with a single key "personas" containing an array of exactly ${count}
persona objects with this structure:
${PERSONA_JSON_SHAPE}`;
}

function buildPersonaUserPrompt(mode: PersonaGenerationMode, context: string, count: number): string {
  const noun = mode === "outline" ? "persona outlines" : "detailed personas";
  return `CONTEXT:
${context}

Generate exactly ${count} diverse ${noun} for customer discovery interviews about this context.`;
}

function elapsed(startMs: number): string {
  return `${((Date.now() - startMs) / 1000).toFixed(1)}s`;
}

async function generateValidatedBatch<T extends { name?: string; role?: string }>(params: {
  gateway: ModelGateway;
  mode: PersonaGenerationMode;
  context: string;
  count: number;
  schema: ZodType<T, ZodTypeDef, unknown>;
  attribution?: LLMUsageAttribution;
}): Promise<T[]> {
  const { gateway, mode, context, count, schema, attribution } = params;
  const useCase: LLMUseCase = mode === "outline" ? "persona_reflection" : "persona_generation";
  const systemPrompt = buildPersonaSystemPrompt(mode, count);
  const basePrompt = buildPersonaUserPrompt(mode, context, count);
  const startTime = Date.now();

  let lastErrors: string[] = [];

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const userPrompt = lastErrors.length > 0
      ? `${basePrompt}\n\n${buildCorrectionPrompt(lastErrors)}`
      : basePrompt;

    console.log(`[PersonaGeneration] Attempt ${attempt} started | mode=${mode} | count=${count} | hasCorrection=${lastErrors.length > 0}`);

    let raw: unknown;
    try {
      raw = await gateway.generateStructured({
        useCase,
        systemPrompt,
        userPrompt,
        schemaName: mode === "outline" ? "persona_outlines" : "personas",
        attribution,
        temperature: 0.8,
        maxTokens: mode === "outline" ? 2000 : Math.min(16_000, 1200 * count),
      });
    } catch (err) {
      if (err instanceof GatewayError && err.kind === "malformed_response") {
        lastErrors = [`response was not valid JSON: ${err.message}`];
        console.warn(`[PersonaGeneration] Attempt ${attempt} returned malformed JSON | mode=${mode} | elapsed=${elapsed(startTime)}`);
        continue;
      }
      throw err;
    }

    const result = validatePersonaBatch(raw, count, schema);
    for (const warning of result.warnings) {
      console.warn(`[PersonaGeneration] ${warning} | mode=${mode}`);
    }
    if (result.valid) {
      console.log(`[PersonaGeneration] Completed | mode=${mode} | generated=${result.items.length} | attempts=${attempt} | elapsed=${elapsed(startTime)}`);
      return result.items;
    }

    lastErrors = result.errors;
    console.warn(`[PersonaGeneration] Attempt ${attempt} failed validation | mode=${mode} | errors=${result.errors.length} | elapsed=${elapsed(startTime)}`);
  }

  throw new GenerationError(
    `Persona generation produced unusable output after ${MAX_ATTEMPTS} attempts: ${lastErrors.slice(0, 3).join("; ")}`,
    lastErrors,
  );
}

function toPersona(generated: GeneratedPersona): Persona {
  return Object.freeze({
    id: randomUUID(),
    name: generated.name,
    age: generated.age ?? null,
    gender: generated.gender,
    occupation: generated.occupation,
    location: generated.location,
    demographics: generated.demographics,
    background: generated.background,
    description: generated.description,
    goals: generated.goals,
    painPoints: generated.painPoints,
    motivations: generated.motivations,
    behaviors: generated.behaviors,
    challenges: generated.challenges,
    personality: generated.personality,
  });
}

export async function generatePersonas(
  gateway: ModelGateway,
  context: string,
  count: number,
  attribution?: LLMUsageAttribution,
): Promise<Persona[]> {
  const generated = await generateValidatedBatch({
    gateway,
    mode: "full",
    context,
    count,
    schema: generatedPersonaSchema,
    attribution,
  });
  return generated.map(toPersona);
}

/** Outline-only preview of the persona mix; no simulation is touched. */
export async function reflectPersonas(
  gateway: ModelGateway,
  context: string,
  count: number,
): Promise<PersonaOutline[]> {
  const outlines = await generateValidatedBatch({
    gateway,
    mode: "outline",
    context,
    count,
    schema: personaOutlineSchema,
  });
  return outlines.map((o) => ({ role: o.role, description: o.description }));
}
