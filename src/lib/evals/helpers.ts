import { vi } from "vitest";
import type { JudgmentPrompt, JudgmentTask } from "../llm/judgment";
import type { EscalationRecord } from "../escalation/types";

/**
 * Shared stubs for pipeline tests. Handlers get the prompt and the 1-based
 * call number for their task.
 */

export type TaskHandler = (prompt: JudgmentPrompt, call: number) => string | Promise<string>;

export const APPROVE = JSON.stringify({ approved: true, feedback: "Looks good." });

export function reject(feedback: string): string {
  return JSON.stringify({ approved: false, feedback });
}

export function draftText(call: number): string {
  return `Draft ${call}: follow the steps in Settings and let us know how it goes.`;
}

const DEFAULT_HANDLERS: Record<JudgmentTask, TaskHandler> = {
  classify: () => JSON.stringify({ category: "Technical" }),
  draft: (_prompt, call) => draftText(call),
  review: () => APPROVE,
};

export function createStubJudgment(handlers: Partial<Record<JudgmentTask, TaskHandler>> = {}) {
  const calls: Record<JudgmentTask, number> = { classify: 0, draft: 0, review: 0 };

  const judge = vi.fn(async (prompt: JudgmentPrompt): Promise<string> => {
    calls[prompt.task] += 1;
    const handler = handlers[prompt.task] ?? DEFAULT_HANDLERS[prompt.task];
    return handler(prompt, calls[prompt.task]);
  });

  return { judge, calls };
}

export const KB_SNIPPETS = [
  "Reset your password from Settings → Account → Reset Password.",
  "Update the app to the latest version before retrying.",
];

export function createStubKnowledge(snippets: string[] = KB_SNIPPETS) {
  return {
    search: vi.fn(async (_query: string, _category: string): Promise<string[]> => snippets),
  };
}

export function createMemorySink() {
  const records: EscalationRecord[] = [];
  const append = vi.fn(async (record: EscalationRecord): Promise<void> => {
    records.push(record);
  });
  return { records, append };
}

export const PASSWORD_TICKET = {
  subject: "Password reset not working on mobile",
  description: "User cannot reset password on iOS app.",
};
