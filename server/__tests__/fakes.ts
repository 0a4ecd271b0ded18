import type { AuditRecord } from "@shared/schema";
import type { AuditSink } from "../audit/auditWriter";
import { NO_EXTRACTION } from "../query/types";
import type {
  CanonicalEntity,
  DecisionRecord,
  EntityKind,
  EvidenceItem,
  MeetingRecord,
  RelationshipRecord,
} from "../query/types";
import type { AnswerGenerator, EvidenceRetriever, GeneratedAnswer, GenerationOptions } from "../rag/types";
import type { ArchiveStore, DecisionFilter, MeetingFilter } from "../storage";
import { AuditConflictError } from "../utils/errorHandler";

/**
 * Deterministic record id for test fixtures: "rec(1)" ->
 * 00000000-0000-4000-8000-000000000001. Valid v4 shape, never the nil id.
 */
export function rec(n: number): string {
  return `00000000-0000-4000-8000-${n.toString(16).padStart(12, "0")}`;
}

export function entity(kind: EntityKind, id: string, name: string, alternateNames: string[] = []): CanonicalEntity {
  return { id, kind, name, alternateNames };
}

export function meeting(overrides: Partial<MeetingRecord> & { id: string }): MeetingRecord {
  return {
    workgroupId: "wg-archives",
    workgroupName: "Archives Workgroup",
    date: "2025-01-08",
    hostId: null,
    documenterId: null,
    participantIds: [],
    topics: [],
    purpose: null,
    ...overrides,
  };
}

export function evidence(overrides: Partial<EvidenceItem> & { recordId: string }): EvidenceItem {
  return {
    date: null,
    text: "Meeting notes",
    score: 0.9,
    groupingName: "Archives Workgroup",
    extraction: { kind: "present", chunkType: "summary", entities: ["Archives Workgroup"], relationships: [] },
    ...overrides,
  };
}

export function unextracted(item: EvidenceItem): EvidenceItem {
  return { ...item, extraction: NO_EXTRACTION };
}

type StoreData = {
  entities?: CanonicalEntity[];
  meetings?: MeetingRecord[];
  decisions?: DecisionRecord[];
  relationships?: RelationshipRecord[];
};

export class InMemoryArchiveStore implements ArchiveStore {
  entities: CanonicalEntity[];
  meetings: MeetingRecord[];
  decisions: DecisionRecord[];
  relationships: RelationshipRecord[];
  calls: Record<string, number> = {};

  constructor(data: StoreData = {}) {
    this.entities = data.entities ?? [];
    this.meetings = data.meetings ?? [];
    this.decisions = data.decisions ?? [];
    this.relationships = data.relationships ?? [];
  }

  private count(method: string): void {
    this.calls[method] = (this.calls[method] ?? 0) + 1;
  }

  async listEntities(kind: EntityKind): Promise<CanonicalEntity[]> {
    this.count("listEntities");
    return this.entities.filter((e) => e.kind === kind);
  }

  async getEntity(kind: EntityKind, id: string): Promise<CanonicalEntity | undefined> {
    this.count("getEntity");
    return this.entities.find((e) => e.kind === kind && e.id === id);
  }

  async listMeetings(filter: MeetingFilter = {}): Promise<MeetingRecord[]> {
    this.count("listMeetings");
    return this.meetings.filter((m) => {
      if (filter.workgroupId && m.workgroupId !== filter.workgroupId) return false;
      if (
        filter.personId &&
        m.hostId !== filter.personId &&
        m.documenterId !== filter.personId &&
        !m.participantIds.includes(filter.personId)
      ) {
        return false;
      }
      if (filter.since && (!m.date || m.date < filter.since)) return false;
      if (filter.until && (!m.date || m.date >= filter.until)) return false;
      return true;
    });
  }

  async getMeeting(id: string): Promise<MeetingRecord | undefined> {
    this.count("getMeeting");
    return this.meetings.find((m) => m.id === id);
  }

  async listDecisions(filter: DecisionFilter = {}): Promise<DecisionRecord[]> {
    this.count("listDecisions");
    const inScope = new Set((await this.listMeetings(filter)).map((m) => m.id));
    const matched = this.decisions.filter(
      (d) => inScope.has(d.meetingId) && (filter.meetingId === undefined || d.meetingId === filter.meetingId),
    );
    return filter.limit !== undefined ? matched.slice(0, filter.limit) : matched;
  }

  async listRelationships(entityId: string): Promise<RelationshipRecord[]> {
    this.count("listRelationships");
    return this.relationships.filter((r) => r.subjectId === entityId || r.objectId === entityId);
  }
}

export class FakeRetriever implements EvidenceRetriever {
  calls: Array<{ queryText: string; topK: number }> = [];

  constructor(private readonly items: EvidenceItem[] = []) {}

  async search(queryText: string, topK: number): Promise<EvidenceItem[]> {
    this.calls.push({ queryText, topK });
    return this.items.slice(0, topK);
  }
}

export class FakeGenerator implements AnswerGenerator {
  calls: Array<{ queryText: string; evidence: EvidenceItem[]; options: GenerationOptions }> = [];

  constructor(
    private readonly text: string = "The Archives Workgroup agreed to publish the summary.",
    private readonly modelVersion: string = "openai:test-model",
  ) {}

  async generate(queryText: string, evidence: EvidenceItem[], options: GenerationOptions): Promise<GeneratedAnswer> {
    this.calls.push({ queryText, evidence, options });
    return { text: this.text, modelVersion: this.modelVersion };
  }
}

export class MemoryAuditSink implements AuditSink {
  records = new Map<string, AuditRecord>();

  async append(queryId: string, record: AuditRecord): Promise<string> {
    const existing = this.records.get(queryId);
    if (existing && JSON.stringify(existing) !== JSON.stringify(record)) {
      throw new AuditConflictError(queryId);
    }
    this.records.set(queryId, record);
    return `memory://${queryId}`;
  }
}

export class FailingAuditSink implements AuditSink {
  async append(): Promise<string> {
    throw new Error("disk full");
  }
}

/** A promise that never settles, for timeout tests. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
