/**
 * Retry Controller
 *
 * Drives one ticket through the state machine. Nodes return partial updates
 * that are merged into a fresh snapshot; the controller alone owns the
 * attempt counter, the refine hint hand-off and the escalation write.
 *
 * `attempts` counts retry cycles and saturates at the limit: a rejection with
 * budget left increments it and loops back, a rejection at the limit escalates.
 */

import { classify } from "@/lib/classify/llmClassify";
import { draft } from "@/lib/llm/draftGenerator";
import { review } from "@/lib/review/reviewer";
import { assertRetrievalLimit, retrieve, DEFAULT_RETRIEVAL_LIMIT } from "@/lib/retrieval/retrieve";
import { applyUpdate, createTicketState } from "@/lib/tickets/state";
import { EscalationError, describeError } from "@/lib/tickets/errors";
import type { TicketInput, TicketState } from "@/lib/tickets/types";
import type { JudgmentService } from "@/lib/llm/judgment";
import type { KnowledgeSource } from "@/lib/retrieval/knowledgeSource";
import type { EscalationRecord, EscalationSink } from "@/lib/escalation/types";
import { isValidTransition, routeAfterReview, routeRetry, type PipelineStage } from "./stateMachine";

export const DEFAULT_MAX_RETRIES = 2;

export type PipelineDeps = {
  judgment: JudgmentService;
  knowledge: KnowledgeSource;
  escalationSink: EscalationSink;
};

export type StageTransition = {
  from: PipelineStage;
  to: PipelineStage;
  attempts: number;
};

export type RunOptions = {
  /** Retry cycles allowed after the first attempt; the next rejection escalates */
  maxRetries?: number;
  retrievalLimit?: number;
  /** Called after every transition with the stage pair and current attempts */
  onTransition?: (transition: StageTransition) => void;
  now?: () => Date;
};

/**
 * Build the escalation row from the final state
 */
export function toEscalationRecord(state: TicketState, timestamp: Date): EscalationRecord {
  return {
    subject: state.subject,
    description: state.description,
    category: state.category ?? "General",
    draft: state.draft ?? "",
    feedback: state.review?.feedback ?? "",
    attempts: state.attempts,
    timestamp: timestamp.toISOString(),
  };
}

/**
 * Run one ticket to a terminal state: approved, or escalated.
 * Fatal errors propagate; no partial state is returned.
 */
export async function runTicket(
  input: TicketInput,
  deps: PipelineDeps,
  options: RunOptions = {}
): Promise<TicketState> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    retrievalLimit = DEFAULT_RETRIEVAL_LIMIT,
    onTransition,
    now = () => new Date(),
  } = options;

  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
  assertRetrievalLimit(retrievalLimit);

  let state = createTicketState(input);
  let stage: PipelineStage = "START";

  const enter = (from: PipelineStage, to: PipelineStage): PipelineStage => {
    if (!isValidTransition(from, to)) {
      throw new Error(`Invalid transition: ${from} → ${to}`);
    }
    console.log(`Ticket "${state.subject}": ${from} → ${to} (attempts ${state.attempts})`);
    onTransition?.({ from, to, attempts: state.attempts });
    return to;
  };

  while (stage !== "END") {
    switch (stage) {
      case "START":
        state = applyUpdate(state, await classify(state, deps.judgment));
        stage = enter(stage, "CLASSIFIED");
        break;

      case "CLASSIFIED":
        state = applyUpdate(state, await retrieve(state, deps.knowledge, retrievalLimit));
        stage = enter(stage, "RETRIEVED");
        break;

      case "RETRIEVED":
        state = applyUpdate(state, await draft(state, deps.judgment));
        stage = enter(stage, "DRAFTED");
        break;

      case "DRAFTED":
        state = applyUpdate(state, await review(state, deps.judgment));
        stage = enter(stage, "REVIEWED");
        break;

      case "REVIEWED": {
        const verdict = state.review ?? { approved: false, feedback: "" };
        if (routeAfterReview(verdict.approved) === "END") {
          stage = enter(stage, "END");
          break;
        }

        state = applyUpdate(state, {
          failures: [...state.failures, { draft: state.draft ?? "", feedback: verdict.feedback }],
        });

        if (routeRetry(state.attempts, maxRetries) === "ESCALATE") {
          stage = enter(stage, "ESCALATED");
          break;
        }

        // Refine: nothing from the rejected attempt survives except the hint
        state = applyUpdate(state, {
          attempts: state.attempts + 1,
          refineHint: verdict.feedback,
          context: [],
          retrievalSource: undefined,
          draft: undefined,
        });
        state = applyUpdate(state, await retrieve(state, deps.knowledge, retrievalLimit));
        stage = enter(stage, "RETRIEVED");
        break;
      }

      case "ESCALATED": {
        try {
          await deps.escalationSink.append(toEscalationRecord(state, now()));
        } catch (error) {
          throw new EscalationError(`Failed to record escalation: ${describeError(error)}`, {
            cause: error,
          });
        }
        state = applyUpdate(state, { escalated: true });
        console.warn(`Ticket "${state.subject}" escalated after ${state.failures.length} rejected drafts`);
        stage = enter(stage, "END");
        break;
      }
    }
  }

  return state;
}
