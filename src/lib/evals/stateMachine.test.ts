import { describe, it, expect } from "vitest";
import {
  PIPELINE_STAGES,
  TRANSITIONS,
  isValidTransition,
  routeAfterReview,
  routeRetry,
  toMermaid,
} from "../pipeline/stateMachine";

describe("transitions", () => {
  it("allows the forward path", () => {
    expect(isValidTransition("START", "CLASSIFIED")).toBe(true);
    expect(isValidTransition("CLASSIFIED", "RETRIEVED")).toBe(true);
    expect(isValidTransition("RETRIEVED", "DRAFTED")).toBe(true);
    expect(isValidTransition("DRAFTED", "REVIEWED")).toBe(true);
  });

  it("allows the review branches", () => {
    expect(isValidTransition("REVIEWED", "END")).toBe(true);
    expect(isValidTransition("REVIEWED", "RETRIEVED")).toBe(true);
    expect(isValidTransition("REVIEWED", "ESCALATED")).toBe(true);
    expect(isValidTransition("ESCALATED", "END")).toBe(true);
  });

  it("rejects skipped or backward edges", () => {
    expect(isValidTransition("START", "DRAFTED")).toBe(false);
    expect(isValidTransition("DRAFTED", "RETRIEVED")).toBe(false);
    expect(isValidTransition("ESCALATED", "RETRIEVED")).toBe(false);
    expect(isValidTransition("END", "START")).toBe(false);
  });

  it("gives every non-terminal stage a way out", () => {
    for (const stage of PIPELINE_STAGES.filter((s) => s !== "END")) {
      expect(TRANSITIONS.some((t) => t.from === stage)).toBe(true);
    }
  });
});

describe("routing", () => {
  it("ends on approval", () => {
    expect(routeAfterReview(true)).toBe("END");
    expect(routeAfterReview(false)).toBe("RETRY");
  });

  it("refines while attempts are below the limit", () => {
    expect(routeRetry(0, 2)).toBe("REFINE");
    expect(routeRetry(1, 2)).toBe("REFINE");
  });

  it("escalates once attempts reach the limit", () => {
    expect(routeRetry(2, 2)).toBe("ESCALATE");
    expect(routeRetry(0, 0)).toBe("ESCALATE");
  });
});

describe("toMermaid", () => {
  it("renders one edge per transition", () => {
    const lines = toMermaid().split("\n");

    expect(lines[0]).toBe("flowchart TD");
    expect(lines).toHaveLength(TRANSITIONS.length + 1);
    expect(lines).toContain("  REVIEWED -->|approved| END");
    expect(lines).toContain("  ESCALATED -->|append escalation record| END");
  });
});
