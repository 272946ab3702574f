import { z } from "zod";

const nonEmptyText = z.string().trim().min(1);
const textList = z.array(z.string().trim()).default([]).transform((items) => items.filter((i) => i.length > 0));
const textMap = z.record(z.string(), z.coerce.string()).default({});

export const generatedPersonaSchema = z.object({
  name: nonEmptyText,
  age: z.coerce.number().int().min(1).max(120).nullable().optional(),
  gender: z.string().trim().default(""),
  occupation: z.string().trim().default(""),
  location: z.string().trim().default(""),
  demographics: textMap,
  background: nonEmptyText,
  description: z.string().trim().default(""),
  goals: z.array(nonEmptyText).min(1),
  painPoints: z.array(nonEmptyText).min(1),
  motivations: z.array(nonEmptyText).min(1),
  behaviors: textList,
  challenges: textList,
  personality: textMap,
});

export type GeneratedPersona = z.infer<typeof generatedPersonaSchema>;

export const personaOutlineSchema = z.object({
  role: nonEmptyText,
  description: nonEmptyText,
});

export type GeneratedPersonaOutline = z.infer<typeof personaOutlineSchema>;

export type PersonaGenerationMode = "full" | "outline";

export const PERSONA_JSON_SHAPE = `{
  "personas": [
    {
      "name": "Full name appropriate to the persona's location",
      "age": 34,
      "gender": "gender",
      "occupation": "specific job title",
      "location": "city, country",
      "demographics": { "income_level": "...", "education": "...", "family_status": "..." },
      "background": "2-4 sentence backstory relevant to the context",
      "description": "one sentence summary of this persona",
      "goals": ["goal 1", "goal 2"],
      "painPoints": ["pain point 1", "pain point 2"],
      "motivations": ["motivation 1", "motivation 2"],
      "behaviors": ["behavior 1", "behavior 2"],
      "challenges": ["challenge 1", "challenge 2"],
      "personality": { "trait": "how it shows up" }
    }
  ]
}`;

export const OUTLINE_JSON_SHAPE = `{
  "reasoning": "why this mix of personas covers the context",
  "personas": [
    { "role": "concise role or title", "description": "2-3 sentences on who they are and why they are worth interviewing" }
  ]
}`;
