import { z } from "zod";
import { fromError } from "zod-validation-error";

const envSchema = z
  .object({
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    SIMULATION_STRUCTURED_MODEL: z.string().min(1).default("gpt-4o-mini"),
    SIMULATION_CONVERSATION_MODEL: z.string().min(1).default("gpt-4o-mini"),
    LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    LLM_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10_000),
    LLM_MAX_IN_FLIGHT: z.coerce.number().int().min(1).default(8),
    SIMULATION_STOP_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
    INSIGHT_TRANSCRIPT_CHAR_LIMIT: z.coerce.number().int().min(1000).default(60_000),
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  })
  .refine((env) => env.LLM_RETRY_MAX_DELAY_MS >= env.LLM_RETRY_BASE_DELAY_MS, {
    message: "LLM_RETRY_MAX_DELAY_MS must be >= LLM_RETRY_BASE_DELAY_MS",
    path: ["LLM_RETRY_MAX_DELAY_MS"],
  });

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  openai: {
    apiKey: string | undefined;
    baseURL: string | undefined;
  };
  models: {
    structured: string;
    conversation: string;
  };
  llm: {
    timeoutMs: number;
    maxInFlight: number;
    retry: RetryPolicy;
  };
  simulation: {
    stopTimeoutMs: number;
    insightTranscriptCharLimit: number;
  };
  port: number;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${fromError(parsed.error).toString()}`);
  }
  const e = parsed.data;
  return {
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
    },
    models: {
      structured: e.SIMULATION_STRUCTURED_MODEL,
      conversation: e.SIMULATION_CONVERSATION_MODEL,
    },
    llm: {
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxInFlight: e.LLM_MAX_IN_FLIGHT,
      retry: {
        maxRetries: e.LLM_MAX_RETRIES,
        baseDelayMs: e.LLM_RETRY_BASE_DELAY_MS,
        maxDelayMs: e.LLM_RETRY_MAX_DELAY_MS,
      },
    },
    simulation: {
      stopTimeoutMs: e.SIMULATION_STOP_TIMEOUT_MS,
      insightTranscriptCharLimit: e.INSIGHT_TRANSCRIPT_CHAR_LIMIT,
    },
    port: e.PORT,
  };
}
