import type { InterviewMessage, Persona } from "@shared/types/simulation";
import type { LLMUsageAttribution } from "../llm-usage";
import type { ModelGateway } from "../model-gateway";
import { buildConversationMessages } from "./conversation-utils";

export const FALLBACK_FOLLOW_UP = "That's interesting. Could you tell me more about that?";

const TOPIC_PREVIEW_LENGTH = 160;

function topicPreview(context: string): string {
  const firstLine = context.trim().split("\n")[0]?.trim() ?? "";
  if (firstLine.length <= TOPIC_PREVIEW_LENGTH) return firstLine;
  return `${firstLine.slice(0, TOPIC_PREVIEW_LENGTH - 3).trimEnd()}...`;
}

export function buildOpeningQuestion(context: string, persona: Persona): string {
  return `Hi ${persona.name}, thanks for taking the time to talk with me today. Our conversation is about "${topicPreview(context)}". To start, could you tell me a little about yourself and how this topic shows up in your day-to-day life?`;
}

export function buildInterviewerSystemPrompt(
  context: string,
  persona: Persona,
  turnNumber: number,
  maxTurns: number,
): string {
  const remaining = maxTurns - turnNumber;
  return `You are an experienced customer discovery interviewer running a one-on-one research interview.

BUSINESS CONTEXT:
${context}

RESPONDENT: ${persona.name}${persona.occupation ? `, ${persona.occupation}` : ""}

GUIDELINES:
1. Ask exactly one open-ended question per message
2. Build on the respondent's most recent answer; probe for concrete stories, pain points and workarounds
3. Do not pitch, lead the respondent, or suggest solutions
4. Keep questions short and conversational
5. Do not repeat questions that have already been answered

This is question ${turnNumber} of at most ${maxTurns}.${remaining === 0 ? " This is the final question; make it count." : ""}

Respond with the question only, without any speaker label.`;
}

function cleanQuestion(raw: string): string {
  return raw
    .trim()
    .replace(/^interviewer\s*:\s*/i, "")
    .replace(/^["']|["']$/g, "")
    .trim();
}

export async function generateFollowUpQuestion(
  gateway: ModelGateway,
  params: {
    context: string;
    persona: Persona;
    transcript: readonly InterviewMessage[];
    turnNumber: number;
    maxTurns: number;
    attribution: LLMUsageAttribution;
  },
): Promise<string> {
  const systemPrompt = buildInterviewerSystemPrompt(params.context, params.persona, params.turnNumber, params.maxTurns);
  const messages = buildConversationMessages(params.transcript, systemPrompt, "interviewer");

  const raw = await gateway.generateReply({
    useCase: "interviewer_turn",
    messages,
    attribution: params.attribution,
    temperature: 0.7,
    maxTokens: 300,
  });

  const question = cleanQuestion(raw);
  return question.length > 0 ? question : FALLBACK_FOLLOW_UP;
}
