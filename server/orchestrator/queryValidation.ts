import { QUERY_LIMITS } from "../config/constants";
import type { InputProblem } from "../verification/messages";

/**
 * Problem with the raw question text, or null when it can be processed.
 * Checked before any collaborator is called.
 */
export function validateQueryText(text: string): InputProblem | null {
  const trimmed = (text ?? "").trim();
  if (!trimmed) return "empty";
  if (trimmed.length < QUERY_LIMITS.MIN_QUERY_LENGTH) return "too_short";
  if (!trimmed.replace(/[?!.]/g, "").trim()) return "punctuation_only";
  return null;
}
