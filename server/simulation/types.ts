import type { Conversation, Persona } from "@shared/types/simulation";
import type { ModelGateway } from "../model-gateway";

export const SIMULATION_LIMITS = {
  MAX_PERSONAS: 10,
  MAX_TURNS: 30,
  MAX_CONTEXT_LENGTH: 4000,
  MIN_TURNS_FOR_SUMMARY: 2,
} as const;

export interface DriverContext {
  gateway: ModelGateway;
  simulationId: string;
  context: string;
  persona: Persona;
  conversation: Conversation;
  maxTurns: number;
  signal: AbortSignal;
  /** False once the owning simulation is terminal or released. */
  canAppend: () => boolean;
  onTurnCompleted: (conversation: Conversation) => void;
}

export interface DriverResult {
  conversationId: string;
  endReason: NonNullable<Conversation["endReason"]>;
  error: string | null;
  diagnostics: string[];
}

export interface SimulationRuntimeConfig {
  stopTimeoutMs: number;
  insightTranscriptCharLimit: number;
}
