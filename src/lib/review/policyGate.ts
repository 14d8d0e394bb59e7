/**
 * Promise language the reply must never contain
 */
const banned: Array<{ pattern: RegExp; phrase: string }> = [
  { pattern: /we guarantee/i, phrase: "we guarantee" },
  { pattern: /i guarantee/i, phrase: "I guarantee" },
  { pattern: /\bwill refund\b/i, phrase: "will refund" },
  { pattern: /\bwill replace\b/i, phrase: "will replace" },
  { pattern: /\bwill ship (today|tomorrow)\b/i, phrase: "will ship today/tomorrow" },
  { pattern: /\byou will receive by\b/i, phrase: "you will receive by" },
];

/**
 * Credentials and payment data must never be requested or echoed back
 */
const sensitive: Array<{ pattern: RegExp; reason: string }> = [
  {
    pattern:
      /\b(reply with|send us|tell us|share with us|provide)\s+(us\s+)?(your\s+)?(current\s+|old\s+)?password\b/i,
    reason: "Asks the customer for their password",
  },
  {
    pattern: /\byour (current |new )?password is\b/i,
    reason: "Discloses a password",
  },
  {
    pattern: /\b(?:\d[ -]?){13,16}\b/,
    reason: "Contains what looks like a card number",
  },
  {
    pattern: /\b(cvv|cvc|security code)\b/i,
    reason: "Mentions a card security code",
  },
];

export type PolicyGateResult = { ok: boolean; reasons: string[] };

export function policyGate(draft: string): PolicyGateResult {
  const reasons: string[] = [];

  for (const rule of banned) {
    if (rule.pattern.test(draft)) {
      reasons.push(`Promise language: "${rule.phrase}"`);
    }
  }

  for (const rule of sensitive) {
    if (rule.pattern.test(draft)) {
      reasons.push(rule.reason);
    }
  }

  if (draft.trim().length === 0) {
    reasons.push("Draft is empty");
  }

  return { ok: reasons.length === 0, reasons };
}
