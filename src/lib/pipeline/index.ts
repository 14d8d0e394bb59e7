/**
 * Pipeline wiring
 *
 * Builds production collaborators from settings and exposes a single
 * `run(ticket)` entry point.
 */

import type OpenAI from "openai";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createSupabaseClient } from "@/lib/db";
import { createClient } from "@/lib/llm/client";
import { createOpenAIJudgment, createUnavailableJudgment } from "@/lib/llm/judgment";
import {
  createSupabaseKnowledgeSource,
  createUnavailableKnowledgeSource,
  type KnowledgeSource,
} from "@/lib/retrieval/knowledgeSource";
import {
  createCsvEscalationSink,
  createSupabaseEscalationSink,
  type EscalationSink,
} from "@/lib/escalation";
import type { PipelineSettings } from "@/lib/settings";
import type { TicketInput, TicketState } from "@/lib/tickets/types";
import { runTicket, type PipelineDeps, type RunOptions } from "./runTicket";

export type Pipeline = {
  deps: PipelineDeps;
  run(input: TicketInput, options?: Pick<RunOptions, "onTransition">): Promise<TicketState>;
};

function createKnowledgeSource(
  settings: PipelineSettings,
  client?: OpenAI,
  supabase?: SupabaseClient
): KnowledgeSource {
  if (!supabase) {
    return createUnavailableKnowledgeSource("Vector store not configured (SUPABASE_URL missing)");
  }
  if (!client) {
    return createUnavailableKnowledgeSource("Embeddings not configured (OPENAI_API_KEY missing)");
  }
  return createSupabaseKnowledgeSource({ limit: settings.retrievalLimit, client, supabase });
}

function createEscalationSink(settings: PipelineSettings, supabase?: SupabaseClient): EscalationSink {
  switch (settings.escalation.sink) {
    case "csv":
      return createCsvEscalationSink(settings.escalation.logPath);
    case "supabase":
      if (!supabase) {
        throw new Error(
          "Supabase escalation sink needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY"
        );
      }
      return createSupabaseEscalationSink({ supabase });
  }
}

/**
 * Wire production collaborators. Every client is built from `settings`;
 * nothing here reads process.env.
 */
export function createPipeline(settings: PipelineSettings): Pipeline {
  const client = settings.openai.apiKey
    ? createClient({
        apiKey: settings.openai.apiKey,
        timeoutMs: settings.openai.timeoutMs,
        maxRetries: settings.openai.maxRetries,
      })
    : undefined;

  const { url, serviceRoleKey } = settings.supabase;
  const supabase = url && serviceRoleKey ? createSupabaseClient(url, serviceRoleKey) : undefined;

  const deps: PipelineDeps = {
    // Without a key the first judgment call fails and the ticket aborts as unclassifiable
    judgment: client
      ? createOpenAIJudgment({ model: settings.openai.model, client })
      : createUnavailableJudgment("OpenAI not configured (OPENAI_API_KEY missing)"),
    knowledge: createKnowledgeSource(settings, client, supabase),
    escalationSink: createEscalationSink(settings, supabase),
  };

  return {
    deps,
    run(input, options = {}) {
      return runTicket(input, deps, {
        maxRetries: settings.maxRetries,
        retrievalLimit: settings.retrievalLimit,
        onTransition: options.onTransition,
      });
    },
  };
}

export { runTicket, toEscalationRecord, DEFAULT_MAX_RETRIES } from "./runTicket";
export type { PipelineDeps, RunOptions, StageTransition } from "./runTicket";
export {
  PIPELINE_STAGES,
  TRANSITIONS,
  isValidTransition,
  routeAfterReview,
  routeRetry,
  toMermaid,
  type PipelineStage,
  type Transition,
} from "./stateMachine";
