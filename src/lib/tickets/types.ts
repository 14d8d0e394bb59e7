import type { Category } from "./taxonomy";

/**
 * Ticket input as received from the caller
 */
export type TicketInput = {
  subject: string;
  description: string;
};

export type Review = {
  approved: boolean;
  feedback: string;
};

/**
 * Draft + feedback pair kept for every rejected attempt
 */
export type AttemptFailure = {
  draft: string;
  feedback: string;
};

export type RetrievalSource = "knowledge" | "fallback";

/**
 * The record threaded through every pipeline step
 */
export type TicketState = {
  readonly subject: string;
  readonly description: string;
  category?: Category;
  context: string[];
  retrievalSource?: RetrievalSource;
  draft?: string;
  review?: Review;
  attempts: number;
  refineHint?: string;
  escalated: boolean;
  failures: AttemptFailure[];
};

/**
 * Partial update returned by a node. Subject and description never change.
 */
export type TicketUpdate = Partial<Omit<TicketState, "subject" | "description">>;
