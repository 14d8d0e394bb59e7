/**
 * LLM Prompts
 *
 * System and user prompts for classification, drafting and review.
 */

import { CATEGORIES, CATEGORY_METADATA, type Category } from "@/lib/tickets/taxonomy";

/**
 * Format context snippets as a bulleted block
 */
export function formatContext(context: string[]): string {
  if (context.length === 0) {
    return "(none)";
  }
  return context.map((snippet) => `- ${snippet}`).join("\n");
}

// --- Classification ---

export const CLASSIFY_SYSTEM_PROMPT = `You are a precise support ticket classifier. Choose exactly ONE category from this allowed set: ${CATEGORIES.join(", ")}.

${CATEGORIES.map((c) => `- ${c}: ${CATEGORY_METADATA[c].description}`).join("\n")}

Return ONLY valid JSON like {"category":"Technical"} with no commentary.`;

export function buildClassifyPrompt(subject: string, description: string): string {
  return `Subject: ${subject}
Description: ${description}

Rules:
- Pick one of: ${CATEGORIES.join(", ")}
- If unsure, choose the closest fit (never respond with Unknown).`;
}

// --- Drafting ---

export const DRAFT_SYSTEM_PROMPT = `You are a customer support agent writing a reply to a ticket.

## Truthfulness (CRITICAL)
- Only state facts that appear in the provided context snippets
- If the context does not cover something, say a team member will follow up

## Safety
- Never promise refunds, replacements, or delivery dates
- Never ask for or repeat passwords, full card numbers or security codes

## Tone & Style
- Empathetic and professional
- Concise (2-4 short paragraphs)
- End with a clear next step for the customer`;

export type DraftPromptInput = {
  subject: string;
  description: string;
  category?: Category;
  context: string[];
  refineHint?: string;
};

export function buildDraftPrompt(input: DraftPromptInput): string {
  let prompt = `## Ticket
Subject: ${input.subject}
Description: ${input.description}
Category: ${input.category ?? "General"}

## Knowledge base context
${formatContext(input.context)}`;

  if (input.refineHint) {
    prompt += `

## Reviewer feedback on the previous draft
${input.refineHint}
Rewrite the reply so this feedback is fully addressed.`;
  }

  prompt += "\n\nWrite the reply now. Return only the reply text.";
  return prompt;
}

// --- Review ---

export const REVIEW_SYSTEM_PROMPT = `You are a strict support reply reviewer. Assess the draft against four checks:
1) Groundedness: every factual claim is traceable to a context snippet.
2) Policy: no refunds/promises beyond policy; no security leaks.
3) Tone: empathetic, concise, professional.
4) Actionability: a clear next step or question for the customer.

Return ONLY JSON with keys: approved (true/false) and feedback (string).
Feedback must be short, actionable, and explain what to change if not approved.`;

export type ReviewPromptInput = {
  subject: string;
  description: string;
  category?: Category;
  context: string[];
  draft: string;
};

export function buildReviewPrompt(input: ReviewPromptInput): string {
  return `Ticket
------
Subject: ${input.subject}
Description: ${input.description}
Category: ${input.category ?? "General"}

Context (knowledge base snippets):
${formatContext(input.context)}

Draft reply
-----------
${input.draft}`;
}
