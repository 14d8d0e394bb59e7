export { CATEGORIES, CATEGORY_METADATA, isCategory, type Category } from "./taxonomy";
export { createTicketState, applyUpdate } from "./state";
export * from "./errors";
export type {
  TicketInput,
  TicketState,
  TicketUpdate,
  Review,
  AttemptFailure,
  RetrievalSource,
} from "./types";
