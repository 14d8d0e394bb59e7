/**
 * Ticket Pipeline State Machine
 *
 * START → CLASSIFIED → RETRIEVED → DRAFTED → REVIEWED, then either END
 * (approved), back to RETRIEVED with a refine hint (rejected, budget left),
 * or ESCALATED → END (rejected, budget spent).
 */

export const PIPELINE_STAGES = [
  "START",
  "CLASSIFIED",
  "RETRIEVED",
  "DRAFTED",
  "REVIEWED",
  "ESCALATED",
  "END",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type Transition = {
  from: PipelineStage;
  to: PipelineStage;
  via: string;
};

/**
 * Every edge the controller may take
 */
export const TRANSITIONS: readonly Transition[] = [
  { from: "START", to: "CLASSIFIED", via: "classify" },
  { from: "CLASSIFIED", to: "RETRIEVED", via: "retrieve" },
  { from: "RETRIEVED", to: "DRAFTED", via: "draft" },
  { from: "DRAFTED", to: "REVIEWED", via: "review" },
  { from: "REVIEWED", to: "END", via: "approved" },
  { from: "REVIEWED", to: "RETRIEVED", via: "rejected, attempts < limit: attempts + 1, refine, retrieve" },
  { from: "REVIEWED", to: "ESCALATED", via: "rejected, attempts = limit" },
  { from: "ESCALATED", to: "END", via: "append escalation record" },
];

export function isValidTransition(from: PipelineStage, to: PipelineStage): boolean {
  return TRANSITIONS.some((t) => t.from === from && t.to === to);
}

export type ReviewOutcome = "END" | "RETRY";

/**
 * Branch taken right after a review
 */
export function routeAfterReview(approved: boolean): ReviewOutcome {
  return approved ? "END" : "RETRY";
}

export type RetryOutcome = "REFINE" | "ESCALATE";

/**
 * Branch taken on a rejection, before the counter moves.
 * Strict comparison: a limit of 2 allows two retries (three drafts).
 */
export function routeRetry(attempts: number, limit: number): RetryOutcome {
  return attempts < limit ? "REFINE" : "ESCALATE";
}

/**
 * Mermaid flowchart of the transition table
 */
export function toMermaid(): string {
  const lines = ["flowchart TD"];
  for (const t of TRANSITIONS) {
    lines.push(`  ${t.from} -->|${t.via}| ${t.to}`);
  }
  return lines.join("\n");
}
