import type { ConversationEndReason } from "@shared/types/simulation";

export interface TurnFlowState {
  cancelled: boolean;
  completedTurns: number;
  maxTurns: number;
  closingSignalled: boolean;
  failed: boolean;
}

export type TurnFlowAction = "continue" | ConversationEndReason;

/** Stop conditions are checked in priority order at the top of every turn. */
export function evaluateTurnFlow(state: TurnFlowState): TurnFlowAction {
  if (state.cancelled) return "cancelled";
  if (state.completedTurns >= state.maxTurns) return "max_turns";
  if (state.closingSignalled) return "natural_close";
  if (state.failed) return "error";
  return "continue";
}
