/**
 * Centralized Query Messages
 *
 * User-facing text for every outcome that is not a supported answer:
 * verification failures, no evidence, invalid input, timeouts and
 * unavailable collaborators. Wording stays in one place so the HTTP
 * surface and the audit trail show the same thing.
 */

import type { VerificationResult } from "../query/types";

export const EXAMPLE_QUERIES = [
  "What decisions were made in the Archives Workgroup?",
  "What meetings discussed budget allocation?",
  "How many meetings are there?",
] as const;

function examples(list: readonly string[]): string {
  return list.map((q) => `- "${q}"`).join("\n");
}

export function verificationFailureMessage(result: VerificationResult): string {
  switch (result.failure) {
    case "missing_citations":
      return (
        "**No citations found.**\n\n" +
        "The query did not retrieve any specific meeting records to support the answer. This could mean:\n" +
        "- The query doesn't match any content in the archive\n" +
        "- The search terms need to be adjusted\n" +
        "- The relevant meetings may not be indexed yet\n\n" +
        "Please try rephrasing your question or using more specific search terms."
      );
    case "invalid_citations":
      return (
        "**No valid citations found.**\n\n" +
        "The query retrieved results, but they don't reference specific meeting records. This usually means:\n" +
        "- The search didn't find matching content in archived meetings\n" +
        "- The results are from system operations rather than meeting data\n\n" +
        "Please try using different search terms or being more specific about what you're looking for."
      );
    case "missing_entity_extraction":
      return (
        "**Citations lack entity extraction verification.**\n\n" +
        "The query found meeting records, but they don't have entity extraction metadata to verify the information. " +
        "This may occur if the index was built without semantic chunking.\n\n" +
        "Please contact an administrator if this persists."
      );
    case null:
      return "";
  }
}

export function noEvidenceMessage(): string {
  return (
    "**No relevant archive data found**\n\n" +
    "Your query didn't match any content in the archive. Try rephrasing your question, " +
    "or include workgroup names, dates or topics.\n\n" +
    "**Example queries:**\n" +
    examples(EXAMPLE_QUERIES)
  );
}

export function timeoutMessage(timeoutMs: number): string {
  return (
    "**Query timeout**\n\n" +
    `Your query took too long to process (exceeded ${Math.round(timeoutMs / 1000)}s). ` +
    "Try a simpler or more specific query, or wait a moment and try again."
  );
}

export function unavailableMessage(): string {
  return (
    "**Service temporarily unavailable**\n\n" +
    "The archive query service is temporarily unavailable. Please try again in a few moments. " +
    "If the problem persists, contact an admin."
  );
}

export function genericErrorMessage(): string {
  return "**An error occurred**\n\nSomething went wrong while processing your query. Please try again.";
}

export type InputProblem = "empty" | "too_short" | "punctuation_only";

export function invalidInputMessage(problem: InputProblem): string {
  switch (problem) {
    case "empty":
      return `Please provide a question or query. Examples:\n${examples(EXAMPLE_QUERIES)}`;
    case "too_short":
      return `Your query seems too short. Please provide more details. Examples:\n${examples(EXAMPLE_QUERIES.slice(0, 2))}`;
    case "punctuation_only":
      return `Please provide a meaningful question. Examples:\n${examples(EXAMPLE_QUERIES.slice(0, 2))}`;
  }
}
