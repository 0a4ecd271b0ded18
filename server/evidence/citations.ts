/**
 * Citation Extraction
 *
 * Turns filtered evidence into citations and decides whether any credible
 * evidence was found at all.
 */

import { NO_EVIDENCE_ANSWER, QUERY_LIMITS, SENTINEL_RECORD_IDS } from "../config/constants";
import { NO_EXTRACTION, type Citation, type EvidenceItem, type ExtractionMetadata, type MeetingRecord } from "../query/types";

export function toExtractionMetadata(
  chunkType: string | null | undefined,
  entities: string[] | null | undefined,
  relationships: string[] | null | undefined,
): ExtractionMetadata {
  const type = chunkType?.trim() ?? "";
  const entityList = entities ?? [];
  if (!type && entityList.length === 0) {
    return NO_EXTRACTION;
  }
  return { kind: "present", chunkType: type, entities: entityList, relationships: relationships ?? [] };
}

export function hasExtractionMetadata(extraction: ExtractionMetadata): boolean {
  return extraction.kind === "present" && (extraction.chunkType.length > 0 || extraction.entities.length > 0);
}

export function truncateExcerpt(text: string, maxChars: number = QUERY_LIMITS.CITATION_EXCERPT_MAX_CHARS): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

export function citationDate(date: string | null): string {
  if (!date) return "";
  return date.split("T")[0];
}

export function extractCitations(evidence: EvidenceItem[]): Citation[] {
  return evidence.map((item) => ({
    recordId: item.recordId,
    date: citationDate(item.date),
    groupingName: item.groupingName,
    excerpt: truncateExcerpt(item.text),
    extraction: item.extraction,
  }));
}

/**
 * Citation for a meeting record returned by a structured lookup (counts,
 * topics, decisions, relationships).
 */
export function meetingCitation(meeting: MeetingRecord, excerpt: string): Citation {
  return {
    recordId: meeting.id,
    date: citationDate(meeting.date),
    groupingName: meeting.workgroupName,
    excerpt: truncateExcerpt(excerpt),
    extraction: NO_EXTRACTION,
  };
}

export function hasCredibleEvidence(evidence: EvidenceItem[]): boolean {
  return evidence.some((item) => item.text.trim().length > 0);
}

export function noEvidenceCitation(): Citation {
  return {
    recordId: SENTINEL_RECORD_IDS.NO_EVIDENCE,
    date: "",
    groupingName: null,
    excerpt: NO_EVIDENCE_ANSWER,
    extraction: NO_EXTRACTION,
  };
}
