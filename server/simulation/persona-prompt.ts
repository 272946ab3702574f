import type { InterviewMessage, Persona } from "@shared/types/simulation";
import type { LLMUsageAttribution } from "../llm-usage";
import type { ModelGateway } from "../model-gateway";
import { buildConversationMessages } from "./conversation-utils";

/** Marker the persona appends when it considers the interview finished. */
export const CLOSING_SIGNAL = "[[END_INTERVIEW]]";

const CLOSING_FALLBACK = "I think that covers everything from my side. Thanks for listening.";

function formatList(label: string, items: string[]): string {
  if (items.length === 0) return "";
  return `\n${label}:\n${items.map((item) => `- ${item}`).join("\n")}`;
}

function formatMap(label: string, entries: Record<string, string>): string {
  const pairs = Object.entries(entries);
  if (pairs.length === 0) return "";
  return `\n${label}: ${pairs.map(([k, v]) => `${k}: ${v}`).join("; ")}`;
}

export function buildPersonaSystemPrompt(persona: Persona, context: string): string {
  let prompt = `You are role-playing as a customer being interviewed for product discovery research. Stay in character throughout the entire conversation. Never break character or acknowledge you are an AI.

PERSONA: ${persona.name}`;

  if (persona.age !== null) prompt += `\nAGE: ${persona.age}`;
  if (persona.gender) prompt += `\nGENDER: ${persona.gender}`;
  if (persona.occupation) prompt += `\nOCCUPATION: ${persona.occupation}`;
  if (persona.location) prompt += `\nLOCATION: ${persona.location}`;
  prompt += formatMap("DEMOGRAPHICS", persona.demographics);

  prompt += `\n\nBACKGROUND: ${persona.background}`;
  if (persona.description) prompt += `\n${persona.description}`;

  prompt += formatList("GOALS", persona.goals);
  prompt += formatList("PAIN POINTS", persona.painPoints);
  prompt += formatList("MOTIVATIONS", persona.motivations);
  prompt += formatList("BEHAVIORS", persona.behaviors);
  prompt += formatList("CHALLENGES", persona.challenges);
  prompt += formatMap("PERSONALITY", persona.personality);

  prompt += `\n\nINTERVIEW TOPIC: ${context}

BEHAVIORAL RULES:
1. Answer from your own experience, in the first person, in 2-5 sentences
2. Stay consistent with your background and prior answers in this conversation
3. Share concrete examples, frustrations and workarounds where they fit
4. If you don't know something, say so naturally rather than making up detailed answers
5. Never break character or mention being an AI
6. When you feel the interview has reached a natural conclusion and you have nothing more to add, end your reply with ${CLOSING_SIGNAL}`;

  return prompt;
}

export interface PersonaReply {
  text: string;
  closing: boolean;
}

export function parsePersonaReply(raw: string): PersonaReply {
  const closing = raw.includes(CLOSING_SIGNAL);
  const text = raw.split(CLOSING_SIGNAL).join("").trim();
  if (closing && text.length === 0) {
    return { text: CLOSING_FALLBACK, closing };
  }
  return { text, closing };
}

export async function generatePersonaReply(
  gateway: ModelGateway,
  params: {
    persona: Persona;
    context: string;
    transcript: readonly InterviewMessage[];
    question: string;
    attribution: LLMUsageAttribution;
  },
): Promise<PersonaReply> {
  const systemPrompt = buildPersonaSystemPrompt(params.persona, params.context);
  const messages = buildConversationMessages(params.transcript, systemPrompt, "persona");
  messages.push({ role: "user", content: params.question });

  const raw = await gateway.generateReply({
    useCase: "persona_reply",
    messages,
    attribution: params.attribution,
    temperature: 0.8,
    maxTokens: 500,
  });
  return parsePersonaReply(raw);
}
