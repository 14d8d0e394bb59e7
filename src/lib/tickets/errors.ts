/**
 * Pipeline Errors
 *
 * Fatal failures abort the ticket and surface to the caller. Degraded
 * retrieval is reported as a warning value and never thrown.
 */

export type PipelineErrorStage = "input" | "classify" | "retrieve" | "draft" | "review" | "escalate";

export class PipelineError extends Error {
  readonly stage: PipelineErrorStage;

  constructor(stage: PipelineErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.stage = stage;
  }
}

export class InvalidTicketError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("input", `Invalid ticket: ${issues.join("; ")}`);
    this.name = "InvalidTicketError";
    this.issues = issues;
  }
}

export class ClassificationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("classify", message, options);
    this.name = "ClassificationError";
  }
}

export class DraftError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("draft", message, options);
    this.name = "DraftError";
  }
}

export class ReviewError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("review", message, options);
    this.name = "ReviewError";
  }
}

export class EscalationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("escalate", message, options);
    this.name = "EscalationError";
  }
}

/**
 * Knowledge source was unavailable or empty; the retriever used built-in snippets.
 */
export type RetrievalDegraded = {
  kind: "RetrievalDegraded";
  category: string;
  reason: string;
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
