/**
 * LLM-Based Ticket Classification
 *
 * Asks the judgment service for a single category and validates the answer
 * against the closed taxonomy. There is no fallback category: a ticket that
 * cannot be classified is aborted.
 */

import { z } from "zod";
import { extractJson, type JudgmentService } from "@/lib/llm/judgment";
import { CLASSIFY_SYSTEM_PROMPT, buildClassifyPrompt } from "@/lib/llm/prompts";
import { CATEGORIES, type Category } from "@/lib/tickets/taxonomy";
import { ClassificationError, describeError } from "@/lib/tickets/errors";
import type { TicketState, TicketUpdate } from "@/lib/tickets/types";

const ClassificationSchema = z.object({
  category: z.string().trim().pipe(z.enum(CATEGORIES)),
});

/**
 * Parse a classifier reply into a category
 */
export function parseCategory(raw: string): Category {
  const json = extractJson(raw);
  if (json === null) {
    throw new ClassificationError(`Classifier returned no JSON: ${raw.slice(0, 200)}`);
  }

  const parsed = ClassificationSchema.safeParse(json);
  if (!parsed.success) {
    throw new ClassificationError(
      `Classifier returned an invalid category: ${JSON.stringify(json).slice(0, 200)}`
    );
  }

  return parsed.data.category;
}

/**
 * Classify a ticket into exactly one category
 */
export async function classifyTicket(
  subject: string,
  description: string,
  judgment: JudgmentService
): Promise<Category> {
  let raw: string;
  try {
    raw = await judgment.judge({
      task: "classify",
      system: CLASSIFY_SYSTEM_PROMPT,
      user: buildClassifyPrompt(subject, description),
    });
  } catch (error) {
    throw new ClassificationError(`Classification call failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  return parseCategory(raw);
}

/**
 * Pipeline node: set the ticket's category
 */
export async function classify(
  state: Readonly<TicketState>,
  judgment: JudgmentService
): Promise<TicketUpdate> {
  const category = await classifyTicket(state.subject, state.description, judgment);
  return { category };
}
