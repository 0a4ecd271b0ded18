/**
 * Decision-list Handler
 *
 * "List the decisions the Archives Workgroup made in 2025."
 * Reads decision items for the meetings in scope, newest first.
 *
 * Layer: Handlers
 */

import { QUERY_LIMITS } from "../config/constants";
import { citationDate, truncateExcerpt } from "../evidence/citations";
import { NO_EXTRACTION, type Citation } from "../query/types";
import type { ArchiveStore } from "../storage";
import { logInfo } from "../utils/logger";
import { resolveQueryScope } from "./scope";
import type { StructuredAnswer } from "./types";

export type DecisionHandlerOptions = {
  now?: Date;
  correlationId?: string;
};

export async function answerDecisionListQuestion(
  question: string,
  store: ArchiveStore,
  options: DecisionHandlerOptions = {},
): Promise<StructuredAnswer> {
  const scope = await resolveQueryScope(question, store, options.now);
  const decisions = await store.listDecisions({
    workgroupId: scope.workgroup?.id,
    since: scope.window?.start,
    until: scope.window?.end,
    limit: QUERY_LIMITS.MAX_DECISIONS_LISTED,
  });

  logInfo(`[Decisions] ${decisions.length} decisions for ${scope.description}`, {
    correlationId: options.correlationId,
  });

  if (decisions.length === 0) {
    return {
      answer: `No decisions found for ${scope.description}.`,
      citations: [],
      evidenceFound: false,
    };
  }

  const lines = [`Found ${decisions.length} decision(s) for ${scope.description}:`];
  decisions.forEach((d, i) => {
    const when = citationDate(d.date) || "undated";
    lines.push(`${i + 1}. ${d.decision} (${d.workgroupName}, ${when})`);
    if (d.rationale) lines.push(`   Rationale: ${d.rationale}`);
    if (d.effect) lines.push(`   Effect: ${d.effect}`);
  });

  const citations: Citation[] = decisions.map((d) => ({
    recordId: d.meetingId,
    date: citationDate(d.date),
    groupingName: d.workgroupName,
    excerpt: truncateExcerpt(d.decision),
    extraction: NO_EXTRACTION,
  }));

  return { answer: lines.join("\n"), citations, evidenceFound: true };
}
