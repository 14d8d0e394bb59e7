/**
 * Reviewer
 *
 * Gates a draft on tone, groundedness, policy and actionability.
 * Deterministic policy checks run first; the judgment service is only asked
 * when the draft clears them. A review is always approve or reject.
 */

import { z } from "zod";
import { policyGate } from "./policyGate";
import { extractJson, type JudgmentService } from "@/lib/llm/judgment";
import { buildReviewPrompt, REVIEW_SYSTEM_PROMPT, type ReviewPromptInput } from "@/lib/llm/prompts";
import { ReviewError, describeError } from "@/lib/tickets/errors";
import type { Review, TicketState, TicketUpdate } from "@/lib/tickets/types";

export const APPROVED_FEEDBACK = "Looks good.";
export const DEFAULT_REJECTION_FEEDBACK =
  "Please ground the reply in the provided context and add clear next steps.";
export const UNPARSEABLE_REVIEW_FEEDBACK =
  "Automatic fallback: unable to parse review; please ensure the draft cites context steps.";

const ReviewSchema = z.object({
  approved: z.boolean(),
  feedback: z.string().optional(),
});

/**
 * Normalize a reviewer reply. Rejections always carry feedback.
 */
export function parseReview(raw: string): Review {
  const parsed = ReviewSchema.safeParse(extractJson(raw));
  if (!parsed.success) {
    return { approved: false, feedback: UNPARSEABLE_REVIEW_FEEDBACK };
  }

  const { approved } = parsed.data;
  const feedback = parsed.data.feedback?.trim() ?? "";

  if (feedback.length > 0) {
    return { approved, feedback };
  }
  return { approved, feedback: approved ? APPROVED_FEEDBACK : DEFAULT_REJECTION_FEEDBACK };
}

/**
 * Review a draft against its context
 */
export async function reviewDraft(
  input: ReviewPromptInput,
  judgment: JudgmentService
): Promise<Review> {
  const gate = policyGate(input.draft);
  if (!gate.ok) {
    return {
      approved: false,
      feedback: `Policy violations: ${gate.reasons.join("; ")}. Remove these and keep to the context.`,
    };
  }

  let raw: string;
  try {
    raw = await judgment.judge({
      task: "review",
      system: REVIEW_SYSTEM_PROMPT,
      user: buildReviewPrompt(input),
    });
  } catch (error) {
    throw new ReviewError(`Review call failed: ${describeError(error)}`, { cause: error });
  }

  return parseReview(raw);
}

/**
 * Pipeline node: replace the review verdict
 */
export async function review(
  state: Readonly<TicketState>,
  judgment: JudgmentService
): Promise<TicketUpdate> {
  const verdict = await reviewDraft(
    {
      subject: state.subject,
      description: state.description,
      category: state.category,
      context: state.context,
      draft: state.draft ?? "",
    },
    judgment
  );

  return { review: verdict };
}
