export type SimulationStatus =
  | "pending"
  | "generating_personas"
  | "ready"
  | "running"
  | "completed"
  | "stopped"
  | "error";

export const TERMINAL_STATUSES: readonly SimulationStatus[] = ["completed", "stopped", "error"];

export function isTerminalStatus(status: SimulationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type SimulationPhase =
  | "idle"
  | "generating_personas"
  | "interviewing"
  | "extracting_insights"
  | "done";

export type Persona = {
  id: string;
  name: string;
  age: number | null;
  gender: string;
  occupation: string;
  location: string;
  demographics: Record<string, string>;
  background: string;
  description: string;
  goals: string[];
  painPoints: string[];
  motivations: string[];
  behaviors: string[];
  challenges: string[];
  personality: Record<string, string>;
};

export type PersonaOutline = {
  role: string;
  description: string;
};

export type MessageRole = "interviewer" | "persona";

export type InterviewMessage = {
  role: MessageRole;
  content: string;
  timestamp: number;
};

export type ConversationEndReason = "max_turns" | "natural_close" | "cancelled" | "error";

export type Conversation = {
  id: string;
  personaId: string;
  messages: InterviewMessage[];
  summary: string | null;
  isComplete: boolean;
  endReason: ConversationEndReason | null;
  error: string | null;
  completedTurns: number;
  startedAt: Date | null;
  completedAt: Date | null;
};

export type Insight = {
  id: string;
  theme: string;
  description: string;
  evidence: string;
  impact: string;
  confidence: number;
  sourceConversationIds: string[];
  createdAt: Date;
};

export type ConversationProgress = {
  conversationId: string;
  personaId: string;
  personaName: string;
  messageCount: number;
  completedTurns: number;
  isActive: boolean;
  hasSummary: boolean;
  /** Share of the conversation's message budget (2 x maxTurns) used so far, 0-100. */
  progressPercentage: number;
};

export type SimulationProgress = {
  status: SimulationStatus;
  phase: SimulationPhase;
  totalTurns: number;
  completedTurns: number;
  activeConversations: number;
  completedConversations: number;
  totalMessages: number;
  insightsCount: number;
  conversations: readonly Readonly<ConversationProgress>[];
  completionPercentage: number;
};

export type TokenUsage = {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type SimulationSnapshot = {
  id: string;
  context: string;
  numPersonas: number;
  maxTurns: number;
  status: SimulationStatus;
  error: string | null;
  diagnostics: string[];
  personaCount: number;
  conversationCount: number;
  insightCount: number;
  tokenUsage: TokenUsage;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
};

export type Outcome<T> =
  | { status: "ok"; value: T }
  | { status: "degraded"; value: T; diagnostic: string };

export function ok<T>(value: T): Outcome<T> {
  return { status: "ok", value };
}

export function degraded<T>(value: T, diagnostic: string): Outcome<T> {
  return { status: "degraded", value, diagnostic };
}

export type SimulationDefaults = {
  numPersonas: number;
  maxTurns: number;
};

export const DEFAULT_SIMULATION_CONFIG: SimulationDefaults = {
  numPersonas: 5,
  maxTurns: 10,
};
