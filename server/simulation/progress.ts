import type {
  ConversationProgress,
  SimulationPhase,
  SimulationProgress,
  SimulationStatus,
} from "@shared/types/simulation";

export const PROGRESS_BANDS = {
  pending: 0,
  generatingPersonas: 5,
  ready: 10,
  interviewingStart: 10,
  interviewingSpan: 80,
  extractingInsights: 90,
  completed: 100,
} as const;

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Percentage for a state; null means "keep the previous value" (stopped, error).
 */
export function bandPercentage(
  status: SimulationStatus,
  phase: SimulationPhase,
  completedTurns: number,
  totalTurns: number,
): number | null {
  switch (status) {
    case "pending":
      return PROGRESS_BANDS.pending;
    case "generating_personas":
      return PROGRESS_BANDS.generatingPersonas;
    case "ready":
      return PROGRESS_BANDS.ready;
    case "running": {
      if (phase === "extracting_insights") return PROGRESS_BANDS.extractingInsights;
      if (totalTurns <= 0) return PROGRESS_BANDS.interviewingStart;
      const fraction = Math.min(1, completedTurns / totalTurns);
      return roundToTenth(PROGRESS_BANDS.interviewingStart + PROGRESS_BANDS.interviewingSpan * fraction);
    }
    case "completed":
      return PROGRESS_BANDS.completed;
    case "stopped":
    case "error":
      return null;
  }
}

const INITIAL_PROGRESS: SimulationProgress = {
  status: "pending",
  phase: "idle",
  totalTurns: 0,
  completedTurns: 0,
  activeConversations: 0,
  completedConversations: 0,
  totalMessages: 0,
  insightsCount: 0,
  conversations: [],
  completionPercentage: 0,
};

export interface TrackedConversation {
  conversationId: string;
  personaId: string;
  personaName: string;
}

export function conversationPercentage(messageCount: number, maxTurns: number): number {
  if (maxTurns <= 0) return 0;
  return roundToTenth(Math.min(100, (messageCount / (maxTurns * 2)) * 100));
}

/**
 * Holds one frozen progress record that is replaced, never mutated, so a read
 * is always a consistent view. Per-conversation rows are replaced in the same
 * update as the totals they feed.
 */
export class ProgressTracker {
  private current: Readonly<SimulationProgress> = Object.freeze({ ...INITIAL_PROGRESS });
  private maxTurns = 0;

  snapshot(): Readonly<SimulationProgress> {
    return this.current;
  }

  update(patch: Partial<Omit<SimulationProgress, "completionPercentage">>): Readonly<SimulationProgress> {
    const next = { ...this.current, ...patch };
    const banded = bandPercentage(next.status, next.phase, next.completedTurns, next.totalTurns);
    const completionPercentage = banded === null
      ? this.current.completionPercentage
      : Math.max(this.current.completionPercentage, banded);
    this.current = Object.freeze({ ...next, completionPercentage });
    return this.current;
  }

  transition(status: SimulationStatus, phase: SimulationPhase): Readonly<SimulationProgress> {
    return this.update({ status, phase });
  }

  beginInterviews(maxTurns: number, conversations: TrackedConversation[]): Readonly<SimulationProgress> {
    this.maxTurns = maxTurns;
    return this.update({
      status: "running",
      phase: "interviewing",
      totalTurns: conversations.length * maxTurns,
      completedTurns: 0,
      activeConversations: conversations.length,
      completedConversations: 0,
      totalMessages: 0,
      conversations: Object.freeze(
        conversations.map((c) =>
          Object.freeze({
            ...c,
            messageCount: 0,
            completedTurns: 0,
            isActive: true,
            hasSummary: false,
            progressPercentage: 0,
          }),
        ),
      ),
    });
  }

  recordTurn(conversationId: string, messageCount: number): Readonly<SimulationProgress> {
    const row = this.find(conversationId);
    if (!row) return this.current;
    const added = Math.max(0, messageCount - row.messageCount);
    return this.update({
      completedTurns: Math.min(this.current.totalTurns, this.current.completedTurns + 1),
      totalMessages: this.current.totalMessages + added,
      conversations: this.replaceRow(conversationId, {
        messageCount,
        completedTurns: Math.min(this.maxTurns, row.completedTurns + 1),
        progressPercentage: conversationPercentage(messageCount, this.maxTurns),
      }),
    });
  }

  /** Counted once per conversation; later calls for the same id are ignored. */
  recordConversationEnd(conversationId: string, hasSummary: boolean): Readonly<SimulationProgress> {
    const row = this.find(conversationId);
    if (!row || !row.isActive) return this.current;
    return this.update({
      activeConversations: Math.max(0, this.current.activeConversations - 1),
      completedConversations: this.current.completedConversations + 1,
      conversations: this.replaceRow(conversationId, { isActive: false, hasSummary }),
    });
  }

  /** Stop: no conversation is active any more, whether or not its driver exited. */
  deactivateAll(): Readonly<SimulationProgress> {
    return this.update({
      activeConversations: 0,
      conversations: Object.freeze(
        this.current.conversations.map((row) => (row.isActive ? Object.freeze({ ...row, isActive: false }) : row)),
      ),
    });
  }

  recordInsights(count: number): Readonly<SimulationProgress> {
    return this.update({ insightsCount: count });
  }

  private find(conversationId: string): Readonly<ConversationProgress> | undefined {
    return this.current.conversations.find((row) => row.conversationId === conversationId);
  }

  private replaceRow(
    conversationId: string,
    patch: Partial<ConversationProgress>,
  ): readonly Readonly<ConversationProgress>[] {
    return Object.freeze(
      this.current.conversations.map((row) =>
        row.conversationId === conversationId ? Object.freeze({ ...row, ...patch }) : row,
      ),
    );
  }
}
