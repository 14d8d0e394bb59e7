import { describe, it, expect } from "vitest";
import { applyUpdate, createTicketState } from "../tickets/state";
import { InvalidTicketError } from "../tickets/errors";
import { isCategory } from "../tickets/taxonomy";

describe("createTicketState", () => {
  it("starts with an empty, unescalated state", () => {
    expect(createTicketState({ subject: " Login ", description: "Cannot log in. " })).toEqual({
      subject: "Login",
      description: "Cannot log in.",
      context: [],
      attempts: 0,
      escalated: false,
      failures: [],
    });
  });

  it("lists every missing field", () => {
    try {
      createTicketState({ subject: "", description: "  " });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTicketError);
      if (error instanceof InvalidTicketError) {
        expect(error.issues).toEqual([
          "subject: Subject is required",
          "description: Description is required",
        ]);
        expect(error.stage).toBe("input");
      }
    }
  });
});

describe("applyUpdate", () => {
  it("returns a new snapshot and leaves the old one alone", () => {
    const before = createTicketState({ subject: "a", description: "b" });
    const after = applyUpdate(before, { category: "Security", attempts: 1 });

    expect(after).not.toBe(before);
    expect(after.category).toBe("Security");
    expect(after.attempts).toBe(1);
    expect(before.category).toBeUndefined();
    expect(before.attempts).toBe(0);
  });

  it("clears a field set to undefined", () => {
    const hinted = applyUpdate(createTicketState({ subject: "a", description: "b" }), {
      refineHint: "shorter",
    });

    expect(applyUpdate(hinted, { refineHint: undefined }).refineHint).toBeUndefined();
  });
});

describe("isCategory", () => {
  it("accepts only taxonomy members", () => {
    expect(isCategory("Billing")).toBe(true);
    expect(isCategory("billing")).toBe(false);
    expect(isCategory(3)).toBe(false);
  });
});
