/**
 * Model Gateway
 *
 * The single seam between the simulation engine and the language model. Two
 * capabilities: structured JSON generation (personas, insights) and free-text
 * conversational replies (interview turns, summaries).
 *
 * Every attempt runs through a process-wide in-flight limiter shared by all
 * simulations, and transient failures are retried with exponential backoff.
 * The SDK's own retries are disabled so this module owns the policy.
 */

import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import PQueue from "p-queue";
import type { RetryPolicy } from "./config";
import { GatewayError } from "./errors";
import {
  withTrackedLlmCall,
  extractOpenAIChatUsage,
  type LLMUseCase,
  type LLMUsageAttribution,
  type UsageLedger,
} from "./llm-usage";

export type ChatRole = "system" | "user" | "assistant";
export type ChatMessage = { role: ChatRole; content: string };

export interface StructuredRequest {
  useCase: LLMUseCase;
  systemPrompt: string;
  userPrompt: string;
  /** Name of the expected JSON shape; used for logging and in the prompt footer. */
  schemaName: string;
  attribution?: LLMUsageAttribution;
  temperature?: number;
  maxTokens?: number;
}

export interface ReplyRequest {
  useCase: LLMUseCase;
  messages: ChatMessage[];
  attribution?: LLMUsageAttribution;
  temperature?: number;
  maxTokens?: number;
}

export interface ModelGateway {
  generateStructured(request: StructuredRequest): Promise<unknown>;
  generateReply(request: ReplyRequest): Promise<string>;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readNumberField(err: object, field: "status" | "code"): number | undefined {
  if (!(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "number" ? value : undefined;
}

function readStringField(err: object, field: "code" | "name"): string | undefined {
  if (!(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}

const NETWORK_ERROR_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"]);

export function classifyGatewayFailure(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;

  const message = err instanceof Error ? err.message : String(err);
  if (typeof err !== "object" || err === null) {
    return new GatewayError("unknown", message, { cause: err });
  }

  const status = readNumberField(err, "status") ?? readNumberField(err, "code");
  if (status !== undefined) {
    if (status === 408) return new GatewayError("timeout", message, { status, cause: err });
    if (status === 429) return new GatewayError("rate_limited", message, { status, cause: err });
    if (status >= 500) return new GatewayError("server_error", message, { status, cause: err });
    if (status === 401 || status === 403) return new GatewayError("auth", message, { status, cause: err });
    if (status >= 400) return new GatewayError("invalid_request", message, { status, cause: err });
  }

  const name = readStringField(err, "name") ?? "";
  if (name === "AbortError" || name === "APIConnectionTimeoutError" || /timed? ?out/i.test(message)) {
    return new GatewayError("timeout", message, { cause: err });
  }
  const code = readStringField(err, "code");
  if (name === "APIConnectionError" || (code !== undefined && NETWORK_ERROR_CODES.has(code))) {
    return new GatewayError("network", message, { cause: err });
  }

  return new GatewayError("unknown", message, { cause: err });
}

export function computeBackoffMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy & { label: string },
  sleep: (ms: number) => Promise<void> = delay,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      const failure = classifyGatewayFailure(err);
      const attempts = attempt + 1;

      if (!failure.retryable) {
        throw attempts > 1 ? failure.withAttempts(attempts) : failure;
      }
      if (attempt >= policy.maxRetries) {
        console.error(`[ModelGateway] ${policy.label} failed after all retries | kind=${failure.kind} | attempts=${attempts} | error=${failure.message}`);
        throw failure.withAttempts(attempts);
      }

      const waitMs = computeBackoffMs(attempt, policy);
      console.warn(`[ModelGateway] ${policy.label} failed, retrying | kind=${failure.kind} | attempt=${attempts} | waitMs=${waitMs}`);
      await sleep(waitMs);
    }
  }
}

/**
 * Pulls the JSON payload out of a model response, tolerating prose or code
 * fences around it.
 */
export function parseJsonContent(content: string): unknown {
  const trimmed = content.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const objectStart = trimmed.indexOf("{");
    const arrayStart = trimmed.indexOf("[");
    const starts = [objectStart, arrayStart].filter((i) => i >= 0);
    if (starts.length === 0) {
      throw new GatewayError("malformed_response", "Model response contained no JSON");
    }
    const start = Math.min(...starts);
    const end = trimmed[start] === "{" ? trimmed.lastIndexOf("}") : trimmed.lastIndexOf("]");
    if (end <= start) {
      throw new GatewayError("malformed_response", "Model response contained truncated JSON");
    }
    try {
      return JSON.parse(trimmed.slice(start, end + 1));
    } catch (err) {
      throw new GatewayError("malformed_response", "Model response was not valid JSON", { cause: err });
    }
  }
}

let sharedCallQueue: PQueue | undefined;

/** The process-wide limiter on in-flight model calls. */
export function getSharedCallQueue(concurrency: number): PQueue {
  if (!sharedCallQueue) {
    sharedCallQueue = new PQueue({ concurrency });
  }
  return sharedCallQueue;
}

/** The slice of the OpenAI client the gateway calls; an `OpenAI` instance satisfies it. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null;
      }>;
    };
  };
}

export interface OpenAIModelGatewayOptions {
  client: ChatCompletionClient;
  models: { structured: string; conversation: string };
  retry: RetryPolicy;
  timeoutMs: number;
  queue: PQueue;
  ledger?: UsageLedger;
}

export class OpenAIModelGateway implements ModelGateway {
  private readonly options: OpenAIModelGatewayOptions;

  constructor(options: OpenAIModelGatewayOptions) {
    this.options = options;
  }

  async generateStructured(request: StructuredRequest): Promise<unknown> {
    const model = this.options.models.structured;
    const content = await this.complete(request.useCase, model, request.attribution, {
      messages: [
        { role: "system", content: `${request.systemPrompt}\n\nRespond with a single JSON object (${request.schemaName}).` },
        { role: "user", content: request.userPrompt },
      ],
      temperature: request.temperature ?? 0.7,
      maxTokens: request.maxTokens ?? 3000,
      json: true,
    });
    return parseJsonContent(content);
  }

  async generateReply(request: ReplyRequest): Promise<string> {
    const model = this.options.models.conversation;
    return await this.complete(request.useCase, model, request.attribution, {
      messages: request.messages,
      temperature: request.temperature ?? 0.7,
      maxTokens: request.maxTokens ?? 500,
      json: false,
    });
  }

  private async complete(
    useCase: LLMUseCase,
    model: string,
    attribution: LLMUsageAttribution | undefined,
    params: { messages: ChatMessage[]; temperature: number; maxTokens: number; json: boolean },
  ): Promise<string> {
    const { client, retry, timeoutMs, queue, ledger } = this.options;

    const tracked = await withRetry(
      () =>
        queue.add(
          () =>
            withTrackedLlmCall({
              attribution: attribution ?? {},
              model,
              useCase,
              timeoutMs,
              ledger,
              callFn: async (signal) =>
                await client.chat.completions.create(
                  {
                    model,
                    messages: params.messages,
                    temperature: params.temperature,
                    max_tokens: params.maxTokens,
                    ...(params.json ? { response_format: { type: "json_object" as const } } : {}),
                  },
                  { signal },
                ),
              extractUsage: (response) => extractOpenAIChatUsage(response),
            }),
          { throwOnTimeout: true },
        ),
      { ...retry, label: useCase },
    );

    const content = tracked.result.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new GatewayError("malformed_response", `${useCase} returned an empty response`);
    }
    return content;
  }
}

export function createOpenAIModelGateway(config: {
  openai: { apiKey: string | undefined; baseURL: string | undefined };
  models: { structured: string; conversation: string };
  llm: { timeoutMs: number; maxInFlight: number; retry: RetryPolicy };
}, ledger?: UsageLedger): OpenAIModelGateway {
  if (!config.openai.apiKey) {
    throw new Error("OPENAI_API_KEY is required to start the model gateway");
  }
  const client = new OpenAI({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    maxRetries: 0,
  });
  return new OpenAIModelGateway({
    client,
    models: config.models,
    retry: config.llm.retry,
    timeoutMs: config.llm.timeoutMs,
    queue: getSharedCallQueue(config.llm.maxInFlight),
    ledger,
  });
}
