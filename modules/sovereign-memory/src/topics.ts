import { RECALL_WILDCARD } from "@sovereign/shared";
import { invalidInput } from "./errors.js";

export const MAX_TOPIC_LENGTH = 200;

/** Trim a topic and reject empty or oversized keys. */
export function normalizeTopic(topic: unknown): string {
  if (typeof topic !== "string") {
    throw invalidInput("topic must be a string");
  }
  const trimmed = topic.trim();
  if (!trimmed) {
    throw invalidInput("topic must not be empty");
  }
  if (trimmed.length > MAX_TOPIC_LENGTH) {
    throw invalidInput(`topic must be at most ${MAX_TOPIC_LENGTH} characters`);
  }
  return trimmed;
}

/** Trim a recall query; "*" stays the wildcard. */
export function normalizeQuery(query: unknown): string {
  if (typeof query !== "string") {
    throw invalidInput("query must be a string");
  }
  const trimmed = query.trim();
  if (!trimmed) {
    throw invalidInput(`query must not be empty (use "${RECALL_WILDCARD}" for all memories)`);
  }
  return trimmed;
}

export function isWildcard(query: string): boolean {
  return query === RECALL_WILDCARD;
}

/** Escape LIKE metacharacters so the fragment matches literally under ESCAPE '\'. */
export function escapeLike(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
