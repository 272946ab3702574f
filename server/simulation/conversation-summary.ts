import type { InterviewMessage, Outcome, Persona } from "@shared/types/simulation";
import { ok, degraded } from "@shared/types/simulation";
import { errorMessage } from "../errors";
import type { LLMUsageAttribution } from "../llm-usage";
import type { ModelGateway } from "../model-gateway";
import { formatTranscript } from "./conversation-utils";
import { SIMULATION_LIMITS } from "./types";

export const SHORT_CONVERSATION_NOTE = "Conversation too short to summarize.";

export async function summarizeConversation(
  gateway: ModelGateway,
  params: {
    context: string;
    persona: Persona;
    transcript: readonly InterviewMessage[];
    completedTurns: number;
    attribution: LLMUsageAttribution;
  },
): Promise<Outcome<string | null>> {
  if (params.completedTurns < SIMULATION_LIMITS.MIN_TURNS_FOR_SUMMARY) {
    return ok(SHORT_CONVERSATION_NOTE);
  }

  const transcript = formatTranscript(params.transcript, params.persona.name);
  try {
    const summary = await gateway.generateReply({
      useCase: "conversation_summary",
      messages: [
        {
          role: "system",
          content: `You summarize customer discovery interviews. Write 3-5 sentences covering the respondent's situation, main pain points, needs and any notable quotes. Be factual; do not add information that is not in the transcript.`,
        },
        {
          role: "user",
          content: `BUSINESS CONTEXT:\n${params.context}\n\nTRANSCRIPT:\n${transcript}`,
        },
      ],
      attribution: params.attribution,
      temperature: 0.3,
      maxTokens: 400,
    });
    return ok(summary.trim());
  } catch (err) {
    const message = errorMessage(err);
    console.warn(`[Driver] Summary failed | conversation=${params.attribution.conversationId ?? "unknown"} | error=${message}`);
    return degraded(null, `Summary unavailable for ${params.persona.name}: ${message}`);
  }
}
