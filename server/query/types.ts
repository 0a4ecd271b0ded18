/**
 * Query Domain Types
 *
 * Purpose:
 * Shapes shared by the resolver, evidence pipeline, handlers, verifier and
 * orchestrator. Table rows and wire schemas live in @shared/schema.
 *
 * Layer: Domain (type definitions)
 */

export type EntityKind = "person" | "workgroup" | "topic";

export type CanonicalEntity = {
  id: string;
  kind: EntityKind;
  name: string;
  alternateNames: string[];
};

/**
 * Structured extraction attached to an evidence chunk at ingestion time.
 * "absent" is the normal state for chunks that were never processed.
 */
export type ExtractionMetadata =
  | { kind: "absent" }
  | {
      kind: "present";
      chunkType: string;
      entities: string[];
      relationships: string[];
    };

export const NO_EXTRACTION: ExtractionMetadata = { kind: "absent" };

export type EvidenceItem = {
  recordId: string;
  date: string | null;
  text: string;
  score: number;
  groupingName: string | null;
  extraction: ExtractionMetadata;
};

export type Citation = {
  recordId: string;
  date: string;
  groupingName: string | null;
  excerpt: string;
  extraction: ExtractionMetadata;
};

export type QueryIntent = "quantitative" | "topic" | "decision_list" | "relationship" | "generic";

export type QueryOutcome =
  | "answered"
  | "no_evidence"
  | "verification_failed"
  | "invalid_input"
  | "timeout"
  | "unavailable"
  | "error";

export type VerificationFailure = "missing_citations" | "invalid_citations" | "missing_entity_extraction";

export type VerificationResult = {
  verified: boolean;
  failure: VerificationFailure | null;
  citationCount: number;
  validCitationCount: number;
  hasInvalidCitations: boolean;
};

export type QueryResult = {
  queryId: string;
  answer: string;
  citations: Citation[];
  evidenceFound: boolean;
  intent: QueryIntent;
  seed: number;
  modelVersion: string;
  timestamp: string;
  auditLogPath: string | null;
  verification: VerificationResult | null;
  outcome: QueryOutcome;
  /** How a quantitative answer was computed; null on other paths. */
  method: string | null;
  /** Count mismatch against a bulk source, when one was checked. */
  discrepancy: string | null;
};

export type ResolvedEntity = {
  id: string;
  canonicalName: string;
  score: number;
  resolved: boolean;
};

export type ResolutionContext = {
  groupingId?: string;
};

export type FilterAnomaly = {
  filter: "record_identifier" | "whole_word" | "date_range";
  inputCount: number;
};

export type AggregateCitation = {
  type: "data_source" | "verification" | "discrepancy";
  description: string;
  source: string;
  sampleRecordIds: string[];
};

export type AggregateAnswer = {
  answer: string;
  count: number;
  uniqueCount?: number;
  source: string;
  method: string;
  citations: AggregateCitation[];
  discrepancy?: string;
  sampledRecords: MeetingRecord[];
};

/**
 * A meeting as the entity store knows it. Participants, host and documenter
 * are person entity ids; topics are topic names as tagged on the record.
 */
export type MeetingRecord = {
  id: string;
  workgroupId: string;
  workgroupName: string;
  date: string | null;
  hostId: string | null;
  documenterId: string | null;
  participantIds: string[];
  topics: string[];
  purpose: string | null;
};

export type DecisionRecord = {
  id: string;
  meetingId: string;
  workgroupName: string;
  date: string | null;
  decision: string;
  rationale: string | null;
  effect: string | null;
};

/**
 * Subject -> relationship -> object, e.g. "Archives Workgroup -> held -> Meeting 2025-01-08".
 */
export type RelationshipRecord = {
  id: string;
  subjectId: string;
  subjectType: string;
  subjectName: string;
  relationship: string;
  objectId: string;
  objectType: string;
  objectName: string;
  sourceMeetingId: string;
};
