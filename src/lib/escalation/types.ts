import type { Category } from "@/lib/tickets/taxonomy";

/**
 * One row per escalated ticket
 */
export type EscalationRecord = {
  subject: string;
  description: string;
  category: Category;
  draft: string;
  feedback: string;
  attempts: number;
  /** ISO-8601 */
  timestamp: string;
};

export const ESCALATION_FIELDS = [
  "subject",
  "description",
  "category",
  "draft",
  "feedback",
  "attempts",
  "timestamp",
] as const satisfies ReadonlyArray<keyof EscalationRecord>;

/**
 * Append-only store read by the human review queue
 */
export interface EscalationSink {
  append(record: EscalationRecord): Promise<void>;
}
