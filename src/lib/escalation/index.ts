/**
 * Escalation Module
 *
 * Append-only hand-off of tickets that exhausted their retry budget.
 */

export {
  ESCALATION_FIELDS,
  type EscalationRecord,
  type EscalationSink,
} from "./types";

export { createSerializedSink } from "./serialize";

export {
  createCsvEscalationSink,
  escapeCsvField,
  formatEscalationRow,
} from "./csvSink";

export { createSupabaseEscalationSink } from "./supabaseSink";
