/**
 * CSV Escalation Log
 *
 * Appends one row per escalated ticket to a local file so humans can review
 * failed cases. The header is written when the file is new or empty.
 */

import { appendFile, mkdir, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { createSerializedSink } from "./serialize";
import { ESCALATION_FIELDS, type EscalationRecord, type EscalationSink } from "./types";

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(values: string[]): string {
  return values.map(escapeCsvField).join(",") + "\n";
}

export function formatEscalationRow(record: EscalationRecord): string {
  return formatCsvRow(ESCALATION_FIELDS.map((field) => String(record[field])));
}

async function isMissingOrEmpty(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.size === 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return true;
    }
    throw error;
  }
}

export function createCsvEscalationSink(path: string): EscalationSink {
  return createSerializedSink({
    async append(record) {
      await mkdir(dirname(path), { recursive: true });

      let chunk = formatEscalationRow(record);
      if (await isMissingOrEmpty(path)) {
        chunk = formatCsvRow([...ESCALATION_FIELDS]) + chunk;
      }

      await appendFile(path, chunk, "utf-8");
    },
  });
}
