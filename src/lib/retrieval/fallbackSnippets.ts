/**
 * Built-in Fallback Snippets
 *
 * Used whenever the knowledge source is unavailable or returns nothing, so the
 * drafter always has context to ground a reply in.
 */

import type { Category } from "@/lib/tickets/taxonomy";

export const FALLBACK_SNIPPETS: Record<Category, readonly string[]> = {
  Technical: [
    "Reset your password from Settings → Account → Reset Password.",
    "Ensure the app is on the latest version; try clearing the cache and retry.",
    "If the reset email is not received, check the spam folder and wait a few minutes before requesting another.",
  ],
  Billing: [
    "Invoices are sent on the 1st of each month.",
    "Refunds follow policy section 3.2 (no partial refunds after 14 days).",
  ],
  Security: [
    "MFA is required for admin roles; see Security Policy §4.",
    "Password rules: 12+ characters, mixed case, at least one symbol.",
  ],
  General: [
    "Thanks for contacting support; we're here to help.",
    "Sharing screenshots speeds up troubleshooting.",
  ],
};

export function getFallbackSnippets(category: Category, limit: number): string[] {
  return FALLBACK_SNIPPETS[category].slice(0, limit);
}
