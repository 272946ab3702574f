import type { InterviewMessage } from "@shared/types/simulation";
import type { ChatMessage } from "../model-gateway";

type Perspective = "interviewer" | "persona";

export function buildConversationMessages(
  transcript: readonly InterviewMessage[],
  systemPrompt: string,
  perspective: Perspective,
): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: "system", content: systemPrompt },
  ];

  for (const entry of transcript) {
    if (perspective === "interviewer") {
      messages.push({ role: entry.role === "interviewer" ? "assistant" : "user", content: entry.content });
    } else {
      messages.push({ role: entry.role === "persona" ? "assistant" : "user", content: entry.content });
    }
  }

  return messages;
}

export function formatTranscript(transcript: readonly InterviewMessage[], personaName: string): string {
  return transcript
    .map((m) => `${m.role === "interviewer" ? "Interviewer" : personaName}: ${m.content}`)
    .join("\n");
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}
