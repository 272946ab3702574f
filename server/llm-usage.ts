import type { TokenUsage } from "@shared/types/simulation";
import { GatewayError } from "./errors";

export type LLMUseCase =
  | "persona_generation"
  | "persona_reflection"
  | "interviewer_turn"
  | "persona_reply"
  | "conversation_summary"
  | "insight_extraction";

export type LLMUsageStatus = "success" | "missing_usage" | "timeout" | "error";

export type LLMUsageAttribution = {
  simulationId?: string;
  conversationId?: string;
};

export type NormalizedTokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type LlmUsageEvent = {
  attribution: LLMUsageAttribution;
  model: string;
  useCase: LLMUseCase;
  status: LLMUsageStatus;
  usage: NormalizedTokenUsage;
  latencyMs: number;
  errorMessage?: string;
};

const ZERO_USAGE: NormalizedTokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export function emptyTokenUsage(): TokenUsage {
  return { calls: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export function addToTokenUsage(bucket: TokenUsage, usage: NormalizedTokenUsage): TokenUsage {
  return {
    calls: bucket.calls + 1,
    promptTokens: bucket.promptTokens + usage.promptTokens,
    completionTokens: bucket.completionTokens + usage.completionTokens,
    totalTokens: bucket.totalTokens + usage.totalTokens,
  };
}

/**
 * Per-simulation token totals for the lifetime of the process. Calls without a
 * simulation attribution (persona reflection) are only counted in the global total.
 * Forgotten simulations stay forgotten: calls that land after release only count globally.
 */
export class UsageLedger {
  private readonly bySimulation = new Map<string, TokenUsage>();
  private readonly released = new Set<string>();
  private total: TokenUsage = emptyTokenUsage();

  record(event: LlmUsageEvent): void {
    this.total = addToTokenUsage(this.total, event.usage);
    const simulationId = event.attribution.simulationId;
    if (!simulationId || this.released.has(simulationId)) return;
    const current = this.bySimulation.get(simulationId) ?? emptyTokenUsage();
    this.bySimulation.set(simulationId, addToTokenUsage(current, event.usage));
  }

  totalsFor(simulationId: string): TokenUsage {
    return this.bySimulation.get(simulationId) ?? emptyTokenUsage();
  }

  overall(): TokenUsage {
    return this.total;
  }

  forget(simulationId: string): void {
    this.bySimulation.delete(simulationId);
    this.released.add(simulationId);
  }

  trackedSimulationCount(): number {
    return this.bySimulation.size;
  }
}

export function extractOpenAIChatUsage(
  response: { usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null },
): { usage: NormalizedTokenUsage; status: LLMUsageStatus } {
  if (!response.usage) {
    return { usage: ZERO_USAGE, status: "missing_usage" };
  }
  const u = response.usage;
  return {
    usage: {
      promptTokens: u.prompt_tokens ?? 0,
      completionTokens: u.completion_tokens ?? 0,
      totalTokens: u.total_tokens ?? (u.prompt_tokens ?? 0) + (u.completion_tokens ?? 0),
    },
    status: "success",
  };
}

export type TrackedLlmCallOptions<T> = {
  attribution: LLMUsageAttribution;
  model: string;
  useCase: LLMUseCase;
  timeoutMs?: number;
  ledger?: UsageLedger;
  callFn: (signal?: AbortSignal) => Promise<T>;
  extractUsage: (response: T) => { usage: NormalizedTokenUsage; status: LLMUsageStatus };
};

export type TrackedLlmResult<T> = {
  result: T;
  usage: NormalizedTokenUsage;
  status: LLMUsageStatus;
  latencyMs: number;
};

function recordLlmUsageEvent(ledger: UsageLedger | undefined, event: LlmUsageEvent): void {
  if (event.status === "error" || event.status === "timeout") {
    console.warn(
      `[LLM Usage] ${event.useCase} ${event.status} | model=${event.model} | simulation=${event.attribution.simulationId ?? "none"} | latencyMs=${event.latencyMs} | error=${event.errorMessage ?? "unknown"}`,
    );
  }
  ledger?.record(event);
}

export async function withTrackedLlmCall<T>(
  options: TrackedLlmCallOptions<T>,
): Promise<TrackedLlmResult<T>> {
  const startTime = Date.now();
  const { attribution, model, useCase, timeoutMs, ledger, callFn, extractUsage } = options;

  let abortController: AbortController | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;

  if (timeoutMs && timeoutMs > 0) {
    const controller = new AbortController();
    abortController = controller;
    timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
  }

  try {
    const result = await callFn(abortController?.signal);
    const latencyMs = Date.now() - startTime;

    if (timeoutId) clearTimeout(timeoutId);

    const { usage, status } = extractUsage(result);
    recordLlmUsageEvent(ledger, { attribution, model, useCase, status, usage, latencyMs });

    return { result, usage, status, latencyMs };
  } catch (err) {
    const latencyMs = Date.now() - startTime;
    if (timeoutId) clearTimeout(timeoutId);

    const status: LLMUsageStatus = timedOut ? "timeout" : "error";
    const message = err instanceof Error ? err.message : String(err);
    recordLlmUsageEvent(ledger, {
      attribution, model, useCase, status, usage: ZERO_USAGE, latencyMs, errorMessage: message,
    });

    if (timedOut) {
      throw new GatewayError("timeout", `${useCase} call timed out after ${timeoutMs}ms`, { cause: err });
    }
    throw err;
  }
}
