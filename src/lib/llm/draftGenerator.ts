/**
 * Draft Generator
 *
 * Produces a reply grounded in the retrieved context. Reviewer feedback from a
 * rejected attempt is folded into the prompt and then cleared from the state.
 */

import { buildDraftPrompt, DRAFT_SYSTEM_PROMPT, type DraftPromptInput } from "./prompts";
import type { JudgmentService } from "./judgment";
import { DraftError, describeError } from "@/lib/tickets/errors";
import type { TicketState, TicketUpdate } from "@/lib/tickets/types";

/**
 * Deterministic reply built straight from the context snippets.
 * Used when the model hands back an empty draft.
 */
export function buildTemplateDraft(context: string[]): string {
  const steps = context.length > 0 ? `\n\n- ${context.join("\n- ")}` : "";
  return (
    "Hi there, thanks for reaching out.\n\n" +
    "I understand you're facing an issue. Here are steps that often resolve it:" +
    steps +
    "\n\nIf this doesn't help, please reply with your OS and app version so we can dig deeper."
  );
}

/**
 * Generate a draft reply
 */
export async function generateDraft(
  input: DraftPromptInput,
  judgment: JudgmentService
): Promise<string> {
  let content: string;
  try {
    content = await judgment.judge({
      task: "draft",
      system: DRAFT_SYSTEM_PROMPT,
      user: buildDraftPrompt(input),
    });
  } catch (error) {
    throw new DraftError(`Draft generation failed: ${describeError(error)}`, { cause: error });
  }

  const draft = content.trim();
  if (draft.length === 0) {
    console.warn("Draft generation returned empty text, using template reply");
    return buildTemplateDraft(input.context);
  }
  return draft;
}

/**
 * Pipeline node: replace the draft and consume the refine hint
 */
export async function draft(
  state: Readonly<TicketState>,
  judgment: JudgmentService
): Promise<TicketUpdate> {
  const text = await generateDraft(
    {
      subject: state.subject,
      description: state.description,
      category: state.category,
      context: state.context,
      refineHint: state.refineHint,
    },
    judgment
  );

  return { draft: text, refineHint: undefined };
}
