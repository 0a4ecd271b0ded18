/**
 * Relationship Handler
 *
 * Structured lookup of "who held / attended / hosted what" for one person or
 * workgroup. The name goes through the entity resolver first; an unknown
 * name gets "Did you mean ...?" suggestions instead of a guess.
 *
 * A meeting is looked up by its record id and answered from the meeting
 * row itself: workgroup, host, documenter, participants and decisions.
 *
 * Layer: Handlers
 */

import { QUERY_LIMITS } from "../config/constants";
import type { EntityResolver } from "../entities/resolver";
import { meetingCitation } from "../evidence/citations";
import { canonicalRecordId } from "../evidence/recordIds";
import type { Citation, EntityKind, MeetingRecord } from "../query/types";
import type { ArchiveStore } from "../storage";
import { ValidationError } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import type { StructuredAnswer } from "./types";

export type RelationshipKind = Extract<EntityKind, "person" | "workgroup"> | "meeting";

const KIND_LABELS: Record<Exclude<RelationshipKind, "meeting">, string> = {
  person: "Person",
  workgroup: "Workgroup",
};

async function personName(store: ArchiveStore, id: string): Promise<string> {
  return (await store.getEntity("person", id))?.name ?? id;
}

export async function answerMeetingRelationships(
  recordId: string,
  store: ArchiveStore,
  correlationId?: string,
): Promise<StructuredAnswer> {
  const id = canonicalRecordId(recordId);
  if (!id) {
    throw new ValidationError(`'${recordId.trim()}' is not a meeting record id.`);
  }

  const meeting = await store.getMeeting(id);
  if (!meeting) {
    return { answer: `Meeting '${id}' not found.`, citations: [], evidenceFound: false };
  }

  const [host, documenter, participants, decisions] = await Promise.all([
    meeting.hostId ? personName(store, meeting.hostId) : null,
    meeting.documenterId ? personName(store, meeting.documenterId) : null,
    Promise.all(meeting.participantIds.map((p) => personName(store, p))),
    store.listDecisions({ meetingId: id }),
  ]);
  logInfo(`[Relationships] Meeting ${id}: ${participants.length} participants, ${decisions.length} decisions`, {
    correlationId,
  });

  const lines = [`Meeting ${id} (${meeting.date ?? "undated"}):`, `- Workgroup: ${meeting.workgroupName}`];
  if (host) lines.push(`- Host: ${host}`);
  if (documenter) lines.push(`- Documenter: ${documenter}`);
  lines.push(
    participants.length > 0 ? `- Participants (${participants.length}): ${participants.join(", ")}` : "- Participants: none recorded",
  );
  if (decisions.length === 0) {
    lines.push("- Decisions: none recorded");
  } else {
    const shown = decisions.slice(0, QUERY_LIMITS.MAX_RELATIONSHIPS_LISTED);
    lines.push(`- Decisions (${decisions.length}):`);
    for (const d of shown) {
      lines.push(`  - ${d.decision}`);
    }
    if (decisions.length > shown.length) {
      lines.push(`  ... and ${decisions.length - shown.length} more`);
    }
  }

  const citation = meetingCitation(
    meeting,
    `${meeting.workgroupName} meeting with ${participants.length} participant(s) and ${decisions.length} decision(s)`,
  );
  return { answer: lines.join("\n"), citations: [citation], evidenceFound: true };
}

export async function answerRelationshipQuery(
  kind: RelationshipKind,
  name: string,
  resolver: EntityResolver,
  store: ArchiveStore,
  correlationId?: string,
): Promise<StructuredAnswer> {
  if (kind === "meeting") {
    return answerMeetingRelationships(name, store, correlationId);
  }

  const resolved = await resolver.resolve(name, kind);

  if (!resolved.resolved) {
    const suggestions = await resolver.suggest(name, kind);
    let answer = `${KIND_LABELS[kind]} '${name.trim()}' not found.`;
    if (suggestions.length > 0) {
      answer += `\n\nDid you mean: ${suggestions.join(", ")}?`;
    }
    return { answer, citations: [], evidenceFound: false };
  }

  const triples = await store.listRelationships(resolved.id);
  logInfo(`[Relationships] ${triples.length} triples for ${kind} "${resolved.canonicalName}"`, { correlationId });

  if (triples.length === 0) {
    return {
      answer: `No relationships found for ${resolved.canonicalName}.`,
      citations: [],
      evidenceFound: false,
    };
  }

  const shown = triples.slice(0, QUERY_LIMITS.MAX_RELATIONSHIPS_LISTED);
  const lines = [`Relationships for ${resolved.canonicalName} (${triples.length}):`];
  for (const t of shown) {
    lines.push(`- ${t.subjectName} -> ${t.relationship} -> ${t.objectName}`);
  }
  if (triples.length > shown.length) {
    lines.push(`... and ${triples.length - shown.length} more`);
  }

  const perMeeting = new Map<string, number>();
  for (const t of shown) {
    perMeeting.set(t.sourceMeetingId, (perMeeting.get(t.sourceMeetingId) ?? 0) + 1);
  }

  const citations: Citation[] = [];
  for (const [meetingId, count] of perMeeting) {
    if (citations.length >= QUERY_LIMITS.MAX_STRUCTURED_CITATIONS) break;
    const meeting: MeetingRecord | undefined = await store.getMeeting(meetingId);
    if (meeting) {
      citations.push(meetingCitation(meeting, `${count} relationship(s) for ${resolved.canonicalName} from this meeting`));
    }
  }

  return { answer: lines.join("\n"), citations, evidenceFound: citations.length > 0 };
}
