import { randomUUID } from "crypto";
import { z } from "zod";
import type { Conversation, Insight, Outcome, Persona } from "@shared/types/simulation";
import { ok, degraded } from "@shared/types/simulation";
import { GatewayError, errorMessage } from "./errors";
import type { LLMUsageAttribution } from "./llm-usage";
import type { ModelGateway } from "./model-gateway";
import { formatTranscript } from "./simulation/conversation-utils";

const MAX_ATTEMPTS = 2;
const BLOCK_SEPARATOR = "\n\n";

export interface TranscriptBlock {
  number: number;
  conversationId: string;
  startedAt: number | null;
  position: number;
  text: string;
}

export interface BoundedTranscripts {
  blocks: TranscriptBlock[];
  droppedConversations: number;
  truncated: boolean;
}

function combinedLength(blocks: TranscriptBlock[]): number {
  if (blocks.length === 0) return 0;
  return blocks.reduce((sum, b) => sum + b.text.length, 0) + BLOCK_SEPARATOR.length * (blocks.length - 1);
}

function compareOldestFirst(a: TranscriptBlock, b: TranscriptBlock): number {
  const aStart = a.startedAt ?? Number.POSITIVE_INFINITY;
  const bStart = b.startedAt ?? Number.POSITIVE_INFINITY;
  if (aStart !== bStart) return aStart < bStart ? -1 : 1;
  return a.position - b.position;
}

/** Keeps the header line and as many of the most recent lines as fit. */
function keepTail(text: string, charLimit: number): string {
  const lines = text.split("\n");
  const header = lines[0] ?? "";
  const kept: string[] = [];
  let size = header.length;
  for (let i = lines.length - 1; i >= 1; i--) {
    const line = lines[i];
    if (size + 1 + line.length > charLimit) break;
    kept.unshift(line);
    size += 1 + line.length;
  }
  return [header, ...kept].join("\n");
}

export function boundTranscripts(blocks: TranscriptBlock[], charLimit: number): BoundedTranscripts {
  const byAge = [...blocks].sort(compareOldestFirst);
  let droppedConversations = 0;

  while (byAge.length > 1 && combinedLength(byAge) > charLimit) {
    byAge.shift();
    droppedConversations++;
  }

  const kept = byAge.sort((a, b) => a.position - b.position);
  let truncated = false;
  if (kept.length === 1 && kept[0].text.length > charLimit) {
    kept[0] = { ...kept[0], text: keepTail(kept[0].text, charLimit) };
    truncated = true;
  }

  return { blocks: kept, droppedConversations, truncated };
}

/** Used when the model gives no usable confidence. */
export const DEFAULT_CONFIDENCE = 3;

export function clampConfidence(value: unknown): number {
  let numeric = Number.NaN;
  if (typeof value === "number") numeric = value;
  else if (typeof value === "string" && value.trim() !== "") numeric = Number(value.trim());
  if (!Number.isFinite(numeric)) return DEFAULT_CONFIDENCE;
  return Math.min(5, Math.max(1, Math.round(numeric)));
}

const rawInsightSchema = z.object({
  theme: z.string().trim().min(1),
  description: z.string().trim().min(1),
  evidence: z.string().trim().catch(""),
  impact: z.string().trim().catch(""),
  confidence: z.unknown(),
  sourceConversations: z.array(z.union([z.number(), z.string()])).catch([]),
});

function extractInsightArray(raw: unknown): unknown[] | null {
  if (Array.isArray(raw)) return raw;
  if (typeof raw === "object" && raw !== null && "insights" in raw) {
    const insights: unknown = raw.insights;
    if (Array.isArray(insights)) return insights;
  }
  return null;
}

function resolveSourceIds(
  refs: Array<number | string>,
  numberToConversationId: ReadonlyMap<number, string>,
): string[] {
  const ids = new Set<string>();
  for (const ref of refs) {
    const n = typeof ref === "number" ? ref : Number(ref.replace(/[^0-9]/g, ""));
    const id = numberToConversationId.get(n);
    if (id) ids.add(id);
  }
  return [...ids];
}

/**
 * Returns null when the response holds no insight array at all; items that fail
 * the schema are dropped individually.
 */
export function parseInsights(
  raw: unknown,
  numberToConversationId: ReadonlyMap<number, string>,
  now: Date = new Date(),
): Insight[] | null {
  const items = extractInsightArray(raw);
  if (items === null) return null;

  const insights: Insight[] = [];
  for (const item of items) {
    const parsed = rawInsightSchema.safeParse(item);
    if (!parsed.success) continue;
    const data = parsed.data;
    insights.push(Object.freeze({
      id: randomUUID(),
      theme: data.theme,
      description: data.description,
      evidence: data.evidence,
      impact: data.impact,
      confidence: clampConfidence(data.confidence),
      sourceConversationIds: resolveSourceIds(data.sourceConversations, numberToConversationId),
      createdAt: now,
    }));
  }
  return insights;
}

const INSIGHT_SYSTEM_PROMPT = `You are an expert product researcher analyzing customer discovery interviews.
Identify the key insights across the transcripts: recurring pain points, unmet needs, motivations,
behaviors and opportunities. Ground every insight in what respondents actually said.

For each insight provide:
- theme: a short label for the insight
- description: one or two sentences explaining it
- evidence: a brief quote or paraphrase from the transcripts supporting it
- impact: why it matters for the product or business
- confidence: an integer from 1 (weak, one respondent) to 5 (strong, consistent across respondents)
- sourceConversations: the numbers of the conversations it is drawn from

OUTPUT:
{
  "insights": [
    { "theme": "...", "description": "...", "evidence": "...", "impact": "...", "confidence": 4, "sourceConversations": [1, 3] }
  ]
}`;

const CORRECTION_NOTE = `CORRECTION REQUIRED:
The previous response did not contain an "insights" array. Respond with a single JSON object
whose "insights" key is an array of insight objects as described.`;

export interface InsightExtractionInput {
  context: string;
  conversations: readonly Conversation[];
  personas: readonly Persona[];
  charLimit: number;
  attribution?: LLMUsageAttribution;
}

export async function extractInsights(
  gateway: ModelGateway,
  input: InsightExtractionInput,
): Promise<Outcome<Insight[]>> {
  const { context, conversations, personas, charLimit, attribution } = input;
  const simulationId = attribution?.simulationId ?? "none";
  const personaNames = new Map(personas.map((p) => [p.id, p.name]));

  const eligible = conversations.filter((c) => c.messages.some((m) => m.role === "persona"));
  if (eligible.length === 0) {
    console.log(`[Insights] No conversations with replies, skipping extraction | simulation=${simulationId}`);
    return ok([]);
  }

  const blocks: TranscriptBlock[] = eligible.map((conversation, index) => {
    const name = personaNames.get(conversation.personaId) ?? "Respondent";
    return {
      number: index + 1,
      conversationId: conversation.id,
      startedAt: conversation.startedAt ? conversation.startedAt.getTime() : null,
      position: index,
      text: `Conversation ${index + 1} (${name})\n${formatTranscript(conversation.messages, name)}`,
    };
  });

  const bounded = boundTranscripts(blocks, charLimit);
  const notes: string[] = [];
  if (bounded.droppedConversations > 0) {
    notes.push(`${bounded.droppedConversations} conversation(s) omitted from insight extraction to fit the transcript limit`);
  }
  if (bounded.truncated) {
    notes.push("transcript truncated to its most recent lines for insight extraction");
  }
  if (notes.length > 0) {
    console.warn(`[Insights] Transcripts bounded | simulation=${simulationId} | dropped=${bounded.droppedConversations} | truncated=${bounded.truncated}`);
  }

  const numberToConversationId = new Map(bounded.blocks.map((b) => [b.number, b.conversationId]));
  const basePrompt = `BUSINESS CONTEXT:
${context}

INTERVIEW TRANSCRIPTS:
${bounded.blocks.map((b) => b.text).join(BLOCK_SEPARATOR)}

Extract the key insights from these ${bounded.blocks.length} interview(s).`;

  const startTime = Date.now();
  let lastProblem = "";

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const userPrompt = attempt > 1 ? `${basePrompt}\n\n${CORRECTION_NOTE}` : basePrompt;

    let raw: unknown;
    try {
      raw = await gateway.generateStructured({
        useCase: "insight_extraction",
        systemPrompt: INSIGHT_SYSTEM_PROMPT,
        userPrompt,
        schemaName: "insights",
        attribution,
        temperature: 0.3,
        maxTokens: 4000,
      });
    } catch (err) {
      if (err instanceof GatewayError && err.kind === "malformed_response") {
        lastProblem = err.message;
        console.warn(`[Insights] Attempt ${attempt} returned malformed JSON | simulation=${simulationId}`);
        continue;
      }
      console.error(`[Insights] Extraction failed | simulation=${simulationId} | error=${errorMessage(err)}`);
      return degraded([], `Insight extraction failed: ${errorMessage(err)}`);
    }

    const insights = parseInsights(raw, numberToConversationId);
    if (insights === null) {
      lastProblem = "response contained no insights array";
      console.warn(`[Insights] Attempt ${attempt} returned no insights array | simulation=${simulationId}`);
      continue;
    }

    console.log(`[Insights] Extracted | simulation=${simulationId} | insights=${insights.length} | conversations=${bounded.blocks.length} | attempts=${attempt} | elapsed=${Date.now() - startTime}ms`);
    return notes.length > 0 ? degraded(insights, notes.join("; ")) : ok(insights);
  }

  return degraded([], `Insight extraction produced unusable output after ${MAX_ATTEMPTS} attempts: ${lastProblem}`);
}
