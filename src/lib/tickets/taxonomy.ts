/**
 * Ticket Category Taxonomy
 *
 * Closed set of categories a ticket can be routed on. Anything outside this
 * list is rejected at the classifier boundary.
 */

export const CATEGORIES = ["Technical", "Billing", "Security", "General"] as const;

export type Category = (typeof CATEGORIES)[number];

export type CategoryMetadata = {
  description: string;
};

export const CATEGORY_METADATA: Record<Category, CategoryMetadata> = {
  Technical: {
    description: "App or product not working: login, password reset, crashes, sync, installs",
  },
  Billing: {
    description: "Invoices, charges, refunds, plan changes, payment methods",
  },
  Security: {
    description: "Account compromise, MFA, suspicious activity, password rules, data exposure",
  },
  General: {
    description: "Anything else: feedback, how-to questions, account questions",
  },
};

export function isCategory(value: unknown): value is Category {
  return CATEGORIES.some((category) => category === value);
}
