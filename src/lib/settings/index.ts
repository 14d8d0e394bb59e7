/**
 * Pipeline Settings
 *
 * Runtime configuration read from the environment. Entry points load `.env`
 * through dotenv before calling loadSettings().
 */

import { z } from "zod";

export const ESCALATION_SINKS = ["csv", "supabase"] as const;

export type EscalationSinkKind = (typeof ESCALATION_SINKS)[number];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const SettingsSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  RETRIEVAL_LIMIT: z.coerce.number().int().min(1).default(3),
  ESCALATION_SINK: z.enum(ESCALATION_SINKS).default("csv"),
  ESCALATION_LOG_PATH: z.string().min(1).default("escalation_log.csv"),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
}).superRefine((env, ctx) => {
  if (env.ESCALATION_SINK === "supabase" && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["ESCALATION_SINK"],
      message: "supabase sink requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY",
    });
  }
});

export type PipelineSettings = {
  openai: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
  };
  /** Retry cycles after the first draft; the next rejection escalates */
  maxRetries: number;
  retrievalLimit: number;
  escalation: {
    sink: EscalationSinkKind;
    logPath: string;
  };
  supabase: {
    url?: string;
    serviceRoleKey?: string;
  };
};

/**
 * Parse settings from an environment map
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const parsed = SettingsSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const s = parsed.data;
  return {
    openai: {
      apiKey: s.OPENAI_API_KEY,
      model: s.OPENAI_MODEL,
      timeoutMs: s.OPENAI_TIMEOUT_MS,
      maxRetries: s.OPENAI_MAX_RETRIES,
    },
    maxRetries: s.MAX_RETRIES,
    retrievalLimit: s.RETRIEVAL_LIMIT,
    escalation: {
      sink: s.ESCALATION_SINK,
      logPath: s.ESCALATION_LOG_PATH,
    },
    supabase: {
      url: s.SUPABASE_URL,
      serviceRoleKey: s.SUPABASE_SERVICE_ROLE_KEY,
    },
  };
}
