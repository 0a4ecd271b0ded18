/**
 * Negative Response Detection
 *
 * A generated answer that says "not mentioned" is not supported by the
 * chunks it was generated from, so it must not be shown with them as
 * citations.
 */

import { isSentinelRecordId } from "../evidence/recordIds";
import type { Citation } from "../query/types";
import { logInfo } from "../utils/logger";

const NEGATIVE_PATTERNS: RegExp[] = [
  /no\s+specific\s+mention/,
  /not\s+mentioned/,
  /no\s+mention/,
  /not\s+found/,
  /no\s+information/,
  /could\s+not\s+find/,
  /does\s+not\s+appear/,
  /not\s+discussed/,
  /not\s+referenced/,
  /no\s+reference/,
  /not\s+present/,
  /no\s+evidence/,
  /no\s+relevant/,
  /nothing\s+about/,
  /no\s+details\s+about/,
  /not\s+included/,
  /not\s+covered/,
];

const LEADING_NEGATION = /^(no|there is no|there are no|there was no|there were no)\b/;

export function isNegativeResponse(answer: string): boolean {
  if (!answer || !answer.trim()) return true;

  const lowered = answer.toLowerCase();
  const pattern = NEGATIVE_PATTERNS.find((p) => p.test(lowered));
  if (pattern) {
    logInfo(`[NegativeResponse] Matched ${pattern.source}`, { answerPreview: answer.slice(0, 100) });
    return true;
  }
  if (LEADING_NEGATION.test(lowered)) {
    logInfo("[NegativeResponse] Matched leading negation", { answerPreview: answer.slice(0, 100) });
    return true;
  }
  return false;
}

export type NegativeResponsePolicyResult = {
  negative: boolean;
  citations: Citation[];
};

/**
 * For a negative answer keep only sentinel citations (they explain why
 * nothing was found). Otherwise the citations pass through.
 */
export function applyNegativeResponsePolicy(answer: string, citations: Citation[]): NegativeResponsePolicyResult {
  if (!isNegativeResponse(answer)) {
    return { negative: false, citations };
  }
  return {
    negative: true,
    citations: citations.filter((c) => isSentinelRecordId(c.recordId)),
  };
}
