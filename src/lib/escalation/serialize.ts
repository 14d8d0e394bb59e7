import type { EscalationRecord, EscalationSink } from "./types";

/**
 * Single-writer wrapper: appends run one at a time, in call order.
 * A failed append rejects its own caller without blocking later ones.
 */
export function createSerializedSink(inner: EscalationSink): EscalationSink {
  let tail: Promise<void> = Promise.resolve();

  return {
    append(record: EscalationRecord): Promise<void> {
      const write = tail.then(() => inner.append(record));
      tail = write.catch(() => undefined);
      return write;
    },
  };
}
