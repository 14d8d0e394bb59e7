import type { SupabaseClient } from "@supabase/supabase-js";
import { getSupabase } from "@/lib/db";
import { createSerializedSink } from "./serialize";
import type { EscalationSink } from "./types";

/**
 * Escalation sink that inserts into the `escalations` table
 */
export function createSupabaseEscalationSink(
  options: { table?: string; supabase?: Pick<SupabaseClient, "from"> } = {}
): EscalationSink {
  const { table = "escalations", supabase } = options;

  return createSerializedSink({
    async append(record) {
      const { error } = await (supabase ?? getSupabase()).from(table).insert({
        subject: record.subject,
        description: record.description,
        category: record.category,
        draft: record.draft,
        feedback: record.feedback,
        attempts: record.attempts,
        escalated_at: record.timestamp,
      });

      if (error) {
        throw new Error(`Failed to record escalation: ${error.message}`);
      }
    },
  });
}
