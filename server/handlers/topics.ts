/**
 * Topic Handler
 *
 * "What topics did the Archives Workgroup discuss in March 2025?"
 * Lists topic tags from the meetings in scope, most frequent first, and
 * cites the meetings that carry them.
 *
 * Layer: Handlers
 */

import { QUERY_LIMITS } from "../config/constants";
import { meetingCitation } from "../evidence/citations";
import type { ArchiveStore } from "../storage";
import { logInfo } from "../utils/logger";
import { meetingFilterFor, resolveQueryScope } from "./scope";
import type { StructuredAnswer } from "./types";

export type TopicHandlerOptions = {
  now?: Date;
  correlationId?: string;
};

export async function answerTopicQuestion(
  question: string,
  store: ArchiveStore,
  options: TopicHandlerOptions = {},
): Promise<StructuredAnswer> {
  const scope = await resolveQueryScope(question, store, options.now);
  const meetings = await store.listMeetings(meetingFilterFor(scope));

  // Tags are counted case-insensitively and shown as first seen
  const counts = new Map<string, { label: string; count: number }>();
  const tagged = meetings.filter((m) => m.topics.length > 0);
  for (const meeting of tagged) {
    for (const topic of new Set(meeting.topics.map((t) => t.trim()).filter(Boolean))) {
      const key = topic.toLowerCase();
      const entry = counts.get(key) ?? { label: topic, count: 0 };
      entry.count++;
      counts.set(key, entry);
    }
  }

  logInfo(`[Topics] ${counts.size} topics across ${tagged.length} meetings for ${scope.description}`, {
    correlationId: options.correlationId,
  });

  if (counts.size === 0) {
    return {
      answer: `No topics found for ${scope.description}.`,
      citations: [],
      evidenceFound: false,
    };
  }

  const ranked = Array.from(counts.values()).sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));
  const shown = ranked.slice(0, QUERY_LIMITS.MAX_TOPICS_LISTED);
  let answer = `Topics discussed in ${scope.description}: ${shown.map((t) => `${t.label} (${t.count})`).join(", ")}.`;
  if (ranked.length > shown.length) {
    answer += ` ... and ${ranked.length - shown.length} more`;
  }

  return {
    answer,
    citations: tagged
      .slice(0, QUERY_LIMITS.MAX_STRUCTURED_CITATIONS)
      .map((m) => meetingCitation(m, `Topics: ${m.topics.join(", ")}`)),
    evidenceFound: true,
  };
}
