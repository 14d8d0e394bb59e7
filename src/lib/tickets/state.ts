import { z } from "zod";
import { InvalidTicketError } from "./errors";
import type { TicketInput, TicketState, TicketUpdate } from "./types";

const TicketInputSchema = z.object({
  subject: z.string().trim().min(1, "Subject is required"),
  description: z.string().trim().min(1, "Description is required"),
});

/**
 * Validate the caller's input and build the initial state
 */
export function createTicketState(input: TicketInput): TicketState {
  const parsed = TicketInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidTicketError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    subject: parsed.data.subject,
    description: parsed.data.description,
    context: [],
    attempts: 0,
    escalated: false,
    failures: [],
  };
}

/**
 * Merge a node's partial update into a new snapshot.
 * An explicit undefined clears an optional field.
 */
export function applyUpdate(state: TicketState, update: TicketUpdate): TicketState {
  return { ...state, ...update };
}
