import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildQuery, retrieve, retrieveContext } from "../retrieval/retrieve";
import { extractKeywords, tokenize } from "../retrieval/keywords";
import { FALLBACK_SNIPPETS } from "../retrieval/fallbackSnippets";
import { createTicketState } from "../tickets/state";
import { createStubKnowledge } from "./helpers";

/**
 * Retrieval: query building, limits and the built-in fallback.
 * The retriever must never hand back an empty context.
 */

const TICKET = {
  category: "Billing" as const,
  subject: "Invoice missing",
  description: "I did not get my March invoice.",
};

function silenceWarnings() {
  return vi.spyOn(console, "warn").mockImplementation(() => undefined);
}

beforeEach(() => {
  silenceWarnings();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("keywords", () => {
  it("tokenizes on 3+ character runs and lowercases", () => {
    expect(tokenize("a ab abc reset_password iOS-17")).toEqual(["abc", "reset_password", "ios-17"]);
  });

  it("drops stop-words", () => {
    expect(extractKeywords(["tone too curt"])).toEqual(["tone", "curt"]);
  });

  it("ranks longer tokens and tokens with digits first", () => {
    expect(extractKeywords(["Mention the 2FA setup steps"])).toEqual([
      "mention",
      "2fa",
      "setup",
      "steps",
    ]);
  });

  it("dedupes across texts", () => {
    expect(extractKeywords(["Reset reset", "RESET"])).toEqual(["reset"]);
  });

  it("keeps at most the requested number", () => {
    expect(extractKeywords(["alpha bravo charlie delta"], 2)).toEqual(["charlie", "alpha"]);
  });
});

describe("buildQuery", () => {
  it("joins subject and description", () => {
    expect(buildQuery(TICKET)).toBe("Invoice missing I did not get my March invoice.");
  });

  it("appends refine-hint keywords", () => {
    expect(buildQuery({ ...TICKET, refineHint: "tone too curt" })).toBe(
      "Invoice missing I did not get my March invoice. tone curt"
    );
  });

  it("ignores a hint with no keywords", () => {
    expect(buildQuery({ ...TICKET, refineHint: "too the and" })).toBe(
      "Invoice missing I did not get my March invoice."
    );
  });
});

describe("retrieveContext", () => {
  it("returns cleaned knowledge snippets up to the limit", async () => {
    const warn = silenceWarnings();
    const knowledge = createStubKnowledge(["  first ", "", "second", "third", "fourth"]);

    const result = await retrieveContext(TICKET, knowledge, 3);

    expect(result).toEqual({ context: ["first", "second", "third"], source: "knowledge" });
    expect(knowledge.search).toHaveBeenCalledWith(
      "Invoice missing I did not get my March invoice.",
      "Billing"
    );
    expect(warn).not.toHaveBeenCalled();
  });

  it("falls back when the knowledge source throws", async () => {
    const warn = silenceWarnings();
    const knowledge = createStubKnowledge();
    knowledge.search.mockRejectedValue(new Error("index missing"));

    const result = await retrieveContext(TICKET, knowledge);

    expect(result).toEqual({
      context: [...FALLBACK_SNIPPETS.Billing],
      source: "fallback",
      degraded: { kind: "RetrievalDegraded", category: "Billing", reason: "index missing" },
    });
    expect(warn).toHaveBeenCalledWith(
      "Retrieval degraded for Billing, using built-in snippets: index missing"
    );
  });

  it("falls back when the knowledge source has nothing", async () => {
    const result = await retrieveContext(TICKET, createStubKnowledge(["  ", ""]));

    expect(result.source).toBe("fallback");
    expect(result.context).toEqual([...FALLBACK_SNIPPETS.Billing]);
    expect(result.degraded?.reason).toBe("knowledge source returned no snippets");
  });

  it("applies the limit to fallback snippets", async () => {
    const result = await retrieveContext(
      { ...TICKET, category: "Technical" },
      createStubKnowledge([]),
      1
    );

    expect(result.context).toEqual(["Reset your password from Settings → Account → Reset Password."]);
  });

  it.each([0, -2])("rejects a limit of %s", async (limit) => {
    const knowledge = createStubKnowledge();

    await expect(retrieveContext(TICKET, knowledge, limit)).rejects.toThrow(
      `retrievalLimit must be a positive integer, got ${limit}`
    );
    expect(knowledge.search).not.toHaveBeenCalled();
  });

  it("has non-empty fallback snippets for every category", () => {
    for (const snippets of Object.values(FALLBACK_SNIPPETS)) {
      expect(snippets.length).toBeGreaterThan(0);
    }
  });
});

describe("retrieve node", () => {
  it("replaces context and records the source", async () => {
    const state = {
      ...createTicketState({ subject: "Hi", description: "Question about my account." }),
      category: "General" as const,
      context: ["stale"],
    };

    expect(await retrieve(state, createStubKnowledge(["fresh"]))).toEqual({
      context: ["fresh"],
      retrievalSource: "knowledge",
    });
  });

  it("is idempotent for identical input", async () => {
    const knowledge = createStubKnowledge(["one", "two"]);
    const state = {
      ...createTicketState({ subject: "Hi", description: "Question." }),
      category: "General" as const,
    };

    expect(await retrieve(state, knowledge)).toEqual(await retrieve(state, knowledge));
  });
});
