/**
 * Answer Prompts
 *
 * Evidence-only answer generation for the generic query path.
 */

import type { EvidenceItem } from "../../query/types";

/**
 * Global "DO NOT" rules for evidence answers.
 * A "no" answer is detected downstream by its wording, so refusals must
 * stay plain.
 */
const EVIDENCE_ANSWER_DONOT_RULES = `
STRICT RULES (DO NOT VIOLATE):
- Do NOT use any knowledge outside the numbered excerpts
- Do NOT guess dates, names or counts that the excerpts do not state
- Do NOT apologize
- If the excerpts do not answer the question, reply with exactly: "No evidence found in the provided excerpts."`;

export const EVIDENCE_ANSWER_SYSTEM_PROMPT = `You answer questions about an archive of workgroup meeting records.
You are given numbered excerpts from meeting records. Each excerpt starts with its record id, date and workgroup.

YOUR TASK:
- Answer the question using only the excerpts
- Refer to the excerpts you used by their number, e.g. [2]
- Keep the answer short and factual
${EVIDENCE_ANSWER_DONOT_RULES}`;

export function formatEvidenceForPrompt(evidence: EvidenceItem[]): string {
  return evidence
    .map((item, i) => {
      const date = item.date ? item.date.split("T")[0] : "unknown date";
      const group = item.groupingName ?? "unknown workgroup";
      return `[${i + 1}] record ${item.recordId} | ${date} | ${group}\n${item.text}`;
    })
    .join("\n\n");
}

export function buildEvidenceAnswerUserPrompt(question: string, evidence: EvidenceItem[]): string {
  return `QUESTION:
${question}

EXCERPTS:
${formatEvidenceForPrompt(evidence)}`;
}
