/**
 * Retrieve
 *
 * Category-aware, refine-aware retrieval. Queries the knowledge source with
 * the ticket text plus keywords from the last reviewer feedback, and falls
 * back to the built-in snippets whenever the source fails or comes back empty.
 */

import { getFallbackSnippets } from "./fallbackSnippets";
import { extractKeywords } from "./keywords";
import type { KnowledgeSource } from "./knowledgeSource";
import { describeError, type RetrievalDegraded } from "@/lib/tickets/errors";
import type { Category } from "@/lib/tickets/taxonomy";
import type { RetrievalSource, TicketState, TicketUpdate } from "@/lib/tickets/types";

export const DEFAULT_RETRIEVAL_LIMIT = 3;

export type RetrieveInput = {
  category: Category;
  subject: string;
  description: string;
  refineHint?: string;
};

export type RetrieveResult = {
  context: string[];
  source: RetrievalSource;
  degraded?: RetrievalDegraded;
};

export function assertRetrievalLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`retrievalLimit must be a positive integer, got ${limit}`);
  }
}

/**
 * Compose the search query from ticket fields and refine-hint keywords
 */
export function buildQuery(input: Omit<RetrieveInput, "category">): string {
  const hintTerms = input.refineHint ? extractKeywords([input.refineHint]).join(" ") : "";
  return [input.subject, input.description, hintTerms]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(" ");
}

/**
 * Fetch context snippets. Never returns an empty list.
 */
export async function retrieveContext(
  input: RetrieveInput,
  knowledge: KnowledgeSource,
  limit: number = DEFAULT_RETRIEVAL_LIMIT
): Promise<RetrieveResult> {
  assertRetrievalLimit(limit);
  const query = buildQuery(input);

  let reason: string;
  try {
    const snippets = (await knowledge.search(query, input.category))
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    if (snippets.length > 0) {
      return { context: snippets.slice(0, limit), source: "knowledge" };
    }
    reason = "knowledge source returned no snippets";
  } catch (error) {
    reason = describeError(error);
  }

  const degraded: RetrievalDegraded = {
    kind: "RetrievalDegraded",
    category: input.category,
    reason,
  };
  console.warn(`Retrieval degraded for ${input.category}, using built-in snippets: ${reason}`);

  return {
    context: getFallbackSnippets(input.category, limit),
    source: "fallback",
    degraded,
  };
}

/**
 * Pipeline node: replace the ticket's context
 */
export async function retrieve(
  state: Readonly<TicketState>,
  knowledge: KnowledgeSource,
  limit: number = DEFAULT_RETRIEVAL_LIMIT
): Promise<TicketUpdate> {
  const result = await retrieveContext(
    {
      category: state.category ?? "General",
      subject: state.subject,
      description: state.description,
      refineHint: state.refineHint,
    },
    knowledge,
    limit
  );

  return { context: result.context, retrievalSource: result.source };
}
