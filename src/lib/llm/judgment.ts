/**
 * Judgment Service
 *
 * The single external collaborator behind classification, drafting and
 * review: a prompt goes in, text comes out. Swapped for stubs in tests.
 */

import type OpenAI from "openai";
import { generate } from "./client";

export type JudgmentTask = "classify" | "draft" | "review";

export type JudgmentPrompt = {
  task: JudgmentTask;
  system: string;
  user: string;
};

export interface JudgmentService {
  judge(prompt: JudgmentPrompt): Promise<string>;
}

type TaskSettings = {
  temperature: number;
  maxTokens: number;
  json: boolean;
};

const TASK_SETTINGS: Record<JudgmentTask, TaskSettings> = {
  classify: { temperature: 0, maxTokens: 100, json: true },
  draft: { temperature: 0.7, maxTokens: 800, json: false },
  review: { temperature: 0, maxTokens: 400, json: true },
};

/**
 * OpenAI-backed judgment service
 */
export function createOpenAIJudgment(options: { model: string; client: OpenAI }): JudgmentService {
  return {
    async judge(prompt) {
      const settings = TASK_SETTINGS[prompt.task];
      const result = await generate(prompt.user, {
        model: options.model,
        systemPrompt: prompt.system,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
        json: settings.json,
        client: options.client,
      });

      if (result.stopReason === "length") {
        console.warn(`Judgment (${prompt.task}) reply was cut off at ${settings.maxTokens} tokens`);
      }
      return result.content;
    },
  };
}

/**
 * Stand-in used when no API key is configured; every call fails, so the
 * first ticket step aborts with a clear message.
 */
export function createUnavailableJudgment(reason: string): JudgmentService {
  return {
    async judge() {
      throw new Error(reason);
    },
  };
}

/**
 * Pull the first JSON object out of a model reply.
 * Returns null when there is none or it does not parse.
 */
export function extractJson(raw: string): unknown {
  const jsonMatch = raw.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(jsonMatch[0]);
    return parsed;
  } catch {
    return null;
  }
}
