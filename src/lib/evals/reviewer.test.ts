import { describe, it, expect } from "vitest";
import {
  APPROVED_FEEDBACK,
  DEFAULT_REJECTION_FEEDBACK,
  UNPARSEABLE_REVIEW_FEEDBACK,
  parseReview,
  review,
  reviewDraft,
} from "../review/reviewer";
import { REVIEW_SYSTEM_PROMPT } from "../llm/prompts";
import { ReviewError } from "../tickets/errors";
import { createTicketState } from "../tickets/state";
import { APPROVE, createStubJudgment, reject } from "./helpers";

const INPUT = {
  subject: "Password reset not working",
  description: "The reset link never arrives.",
  category: "Technical" as const,
  context: ["Check the spam folder for the reset email."],
  draft: "Please check your spam folder for the reset email and tell us if it is there.",
};

describe("parseReview", () => {
  it("keeps trimmed feedback", () => {
    expect(parseReview('{"approved": false, "feedback": "  add steps  "}')).toEqual({
      approved: false,
      feedback: "add steps",
    });
  });

  it("fills in feedback for a bare approval", () => {
    expect(parseReview('{"approved": true, "feedback": ""}')).toEqual({
      approved: true,
      feedback: APPROVED_FEEDBACK,
    });
  });

  it("fills in feedback for a bare rejection", () => {
    expect(parseReview('{"approved": false}')).toEqual({
      approved: false,
      feedback: DEFAULT_REJECTION_FEEDBACK,
    });
  });

  it("rejects a reply that is not JSON", () => {
    expect(parseReview("Looks fine to me")).toEqual({
      approved: false,
      feedback: UNPARSEABLE_REVIEW_FEEDBACK,
    });
  });

  it("rejects a reply with the wrong shape", () => {
    expect(parseReview('{"approved": "yes"}')).toEqual({
      approved: false,
      feedback: UNPARSEABLE_REVIEW_FEEDBACK,
    });
  });
});

describe("reviewDraft", () => {
  it("asks the reviewer with the draft and its context", async () => {
    const { judge } = createStubJudgment({ review: () => APPROVE });

    const verdict = await reviewDraft(INPUT, { judge });

    expect(verdict).toEqual({ approved: true, feedback: "Looks good." });
    const [prompt] = judge.mock.calls[0] ?? [];
    expect(prompt?.task).toBe("review");
    expect(prompt?.system).toBe(REVIEW_SYSTEM_PROMPT);
    expect(prompt?.user).toContain("- Check the spam folder for the reset email.");
    expect(prompt?.user).toContain(`Draft reply\n-----------\n${INPUT.draft}`);
  });

  it("passes rejection feedback through", async () => {
    const { judge } = createStubJudgment({ review: () => reject("Mention the spam folder first.") });

    expect(await reviewDraft(INPUT, { judge })).toEqual({
      approved: false,
      feedback: "Mention the spam folder first.",
    });
  });

  it("rejects policy violations without calling the reviewer", async () => {
    const { judge } = createStubJudgment();

    const verdict = await reviewDraft(
      { ...INPUT, draft: "Please reply with your password so we can reset it." },
      { judge }
    );

    expect(verdict).toEqual({
      approved: false,
      feedback:
        "Policy violations: Asks the customer for their password. Remove these and keep to the context.",
    });
    expect(judge).not.toHaveBeenCalled();
  });

  it("wraps a failed call in ReviewError", async () => {
    const { judge } = createStubJudgment({
      review: () => {
        throw new Error("offline");
      },
    });

    const attempt = reviewDraft(INPUT, { judge });

    await expect(attempt).rejects.toBeInstanceOf(ReviewError);
    await expect(attempt).rejects.toThrow("Review call failed: offline");
  });
});

describe("review node", () => {
  it("rejects a missing draft as empty", async () => {
    const { judge } = createStubJudgment();
    const state = createTicketState({ subject: "a", description: "b" });

    expect(await review(state, { judge })).toEqual({
      review: {
        approved: false,
        feedback: "Policy violations: Draft is empty. Remove these and keep to the context.",
      },
    });
    expect(judge).not.toHaveBeenCalled();
  });
});
