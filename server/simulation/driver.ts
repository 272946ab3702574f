import type { ConversationEndReason, InterviewMessage } from "@shared/types/simulation";
import { errorMessage } from "../errors";
import type { LLMUsageAttribution } from "../llm-usage";
import { countWords } from "./conversation-utils";
import { summarizeConversation } from "./conversation-summary";
import { buildOpeningQuestion, generateFollowUpQuestion } from "./interviewer";
import { generatePersonaReply } from "./persona-prompt";
import { evaluateTurnFlow } from "./turn-flow";
import type { DriverContext, DriverResult } from "./types";

function message(role: InterviewMessage["role"], content: string): InterviewMessage {
  return Object.freeze({ role, content, timestamp: Date.now() });
}

/**
 * Runs one persona's interview turn by turn until a stop condition holds, then
 * summarizes it. Failures end this conversation only; the partial transcript is kept.
 */
export async function runConversation(ctx: DriverContext): Promise<DriverResult> {
  const { gateway, simulationId, context, persona, conversation, maxTurns, signal } = ctx;
  const attribution: LLMUsageAttribution = { simulationId, conversationId: conversation.id };
  const diagnostics: string[] = [];
  const startTime = Date.now();

  conversation.startedAt = new Date();
  console.log(`[Driver] Conversation started | simulation=${simulationId} | conversation=${conversation.id} | maxTurns=${maxTurns}`);

  let closingSignalled = false;
  let failure: string | null = null;
  let endReason: ConversationEndReason;

  for (;;) {
    const action = evaluateTurnFlow({
      cancelled: signal.aborted,
      completedTurns: conversation.completedTurns,
      maxTurns,
      closingSignalled,
      failed: failure !== null,
    });
    if (action !== "continue") {
      endReason = action;
      break;
    }

    const turnNumber = conversation.completedTurns + 1;
    try {
      const question = turnNumber === 1
        ? buildOpeningQuestion(context, persona)
        : await generateFollowUpQuestion(gateway, {
            context, persona, transcript: conversation.messages, turnNumber, maxTurns, attribution,
          });

      const reply = await generatePersonaReply(gateway, {
        persona, context, transcript: conversation.messages, question, attribution,
      });

      if (!ctx.canAppend()) {
        endReason = "cancelled";
        break;
      }

      conversation.messages.push(message("interviewer", question), message("persona", reply.text));
      conversation.completedTurns = turnNumber;
      closingSignalled = reply.closing;
      ctx.onTurnCompleted(conversation);

      console.log(`[Driver] Turn completed | conversation=${conversation.id} | turn=${turnNumber} | replyWords=${countWords(reply.text)} | closing=${reply.closing}`);
    } catch (err) {
      failure = errorMessage(err);
      conversation.error = failure;
      console.error(`[Driver] Turn failed | conversation=${conversation.id} | turn=${turnNumber} | error=${failure}`);
    }
  }

  if (ctx.canAppend()) {
    const summary = await summarizeConversation(gateway, {
      context, persona, transcript: conversation.messages, completedTurns: conversation.completedTurns, attribution,
    });
    if (summary.status === "degraded") diagnostics.push(summary.diagnostic);

    if (ctx.canAppend()) {
      conversation.summary = summary.value;
      conversation.endReason = endReason;
      conversation.isComplete = true;
      conversation.completedAt = new Date();
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`[Driver] Conversation ended | conversation=${conversation.id} | reason=${endReason} | turns=${conversation.completedTurns} | elapsed=${elapsed}s`);

  return { conversationId: conversation.id, endReason, error: failure, diagnostics };
}
