/**
 * Archive Storage
 *
 * Purpose:
 * Read access to canonical entities (people, workgroups, topics), meeting
 * records, decisions and relationship triples. The query engine only reads;
 * ingestion owns every write.
 *
 * Layer: Data access
 */

import { and, asc, desc, eq, gte, lt, or, sql, type SQL } from "drizzle-orm";
import {
  workgroups as workgroupsTable,
  people as peopleTable,
  topics as topicsTable,
  meetings as meetingsTable,
  decisionItems as decisionItemsTable,
  relationshipTriples as relationshipTriplesTable,
} from "@shared/schema";
import { getDb } from "./db";
import type {
  CanonicalEntity,
  DecisionRecord,
  EntityKind,
  MeetingRecord,
  RelationshipRecord,
} from "./query/types";

/**
 * Date bounds are ISO dates (YYYY-MM-DD); `until` is exclusive.
 */
export type MeetingFilter = {
  workgroupId?: string;
  personId?: string;
  since?: string;
  until?: string;
};

export type DecisionFilter = {
  meetingId?: string;
  workgroupId?: string;
  since?: string;
  until?: string;
  limit?: number;
};

export interface EntityStore {
  listEntities(kind: EntityKind): Promise<CanonicalEntity[]>;
  getEntity(kind: EntityKind, id: string): Promise<CanonicalEntity | undefined>;
}

export interface ArchiveStore extends EntityStore {
  listMeetings(filter?: MeetingFilter): Promise<MeetingRecord[]>;
  getMeeting(id: string): Promise<MeetingRecord | undefined>;
  listDecisions(filter?: DecisionFilter): Promise<DecisionRecord[]>;
  listRelationships(entityId: string): Promise<RelationshipRecord[]>;
}

const meetingColumns = {
  id: meetingsTable.id,
  workgroupId: meetingsTable.workgroupId,
  workgroupName: workgroupsTable.name,
  meetingDate: meetingsTable.meetingDate,
  hostId: meetingsTable.hostId,
  documenterId: meetingsTable.documenterId,
  participantIds: meetingsTable.participantIds,
  topicsCovered: meetingsTable.topicsCovered,
  purpose: meetingsTable.purpose,
};

type MeetingRow = {
  id: string;
  workgroupId: string;
  workgroupName: string | null;
  meetingDate: string | null;
  hostId: string | null;
  documenterId: string | null;
  participantIds: string[];
  topicsCovered: string[];
  purpose: string | null;
};

function toMeetingRecord(row: MeetingRow): MeetingRecord {
  return {
    id: row.id,
    workgroupId: row.workgroupId,
    workgroupName: row.workgroupName ?? "Unknown workgroup",
    date: row.meetingDate,
    hostId: row.hostId,
    documenterId: row.documenterId,
    participantIds: row.participantIds,
    topics: row.topicsCovered,
    purpose: row.purpose,
  };
}

export class DbArchiveStore implements ArchiveStore {
  private get db() {
    return getDb();
  }

  // Entities
  async listEntities(kind: EntityKind): Promise<CanonicalEntity[]> {
    switch (kind) {
      case "person": {
        const rows = await this.db.select().from(peopleTable).orderBy(asc(peopleTable.displayName));
        return rows.map((r) => ({ id: r.id, kind, name: r.displayName, alternateNames: r.alternateNames }));
      }
      case "workgroup": {
        const rows = await this.db.select().from(workgroupsTable).orderBy(asc(workgroupsTable.name));
        return rows.map((r) => ({ id: r.id, kind, name: r.name, alternateNames: r.alternateNames }));
      }
      case "topic": {
        const rows = await this.db.select().from(topicsTable).orderBy(asc(topicsTable.name));
        return rows.map((r) => ({ id: r.id, kind, name: r.name, alternateNames: r.alternateNames }));
      }
    }
  }

  async getEntity(kind: EntityKind, id: string): Promise<CanonicalEntity | undefined> {
    const all = await this.listEntities(kind);
    return all.find((e) => e.id === id);
  }

  // Meetings
  async listMeetings(filter: MeetingFilter = {}): Promise<MeetingRecord[]> {
    const conditions: Array<SQL | undefined> = [];
    if (filter.workgroupId) {
      conditions.push(eq(meetingsTable.workgroupId, filter.workgroupId));
    }
    if (filter.personId) {
      conditions.push(
        or(
          eq(meetingsTable.hostId, filter.personId),
          eq(meetingsTable.documenterId, filter.personId),
          sql`${meetingsTable.participantIds} @> ${JSON.stringify([filter.personId])}::jsonb`,
        ),
      );
    }
    if (filter.since) {
      conditions.push(gte(meetingsTable.meetingDate, filter.since));
    }
    if (filter.until) {
      conditions.push(lt(meetingsTable.meetingDate, filter.until));
    }

    const rows = await this.db
      .select(meetingColumns)
      .from(meetingsTable)
      .leftJoin(workgroupsTable, eq(meetingsTable.workgroupId, workgroupsTable.id))
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(meetingsTable.meetingDate), asc(meetingsTable.id));
    return rows.map(toMeetingRecord);
  }

  async getMeeting(id: string): Promise<MeetingRecord | undefined> {
    const rows = await this.db
      .select(meetingColumns)
      .from(meetingsTable)
      .leftJoin(workgroupsTable, eq(meetingsTable.workgroupId, workgroupsTable.id))
      .where(eq(meetingsTable.id, id))
      .limit(1);
    return rows[0] ? toMeetingRecord(rows[0]) : undefined;
  }

  // Decisions
  async listDecisions(filter: DecisionFilter = {}): Promise<DecisionRecord[]> {
    const conditions: Array<SQL | undefined> = [];
    if (filter.meetingId) {
      conditions.push(eq(decisionItemsTable.meetingId, filter.meetingId));
    }
    if (filter.workgroupId) {
      conditions.push(eq(meetingsTable.workgroupId, filter.workgroupId));
    }
    if (filter.since) {
      conditions.push(gte(meetingsTable.meetingDate, filter.since));
    }
    if (filter.until) {
      conditions.push(lt(meetingsTable.meetingDate, filter.until));
    }

    const query = this.db
      .select({
        id: decisionItemsTable.id,
        meetingId: decisionItemsTable.meetingId,
        workgroupName: workgroupsTable.name,
        meetingDate: meetingsTable.meetingDate,
        decision: decisionItemsTable.decision,
        rationale: decisionItemsTable.rationale,
        effect: decisionItemsTable.effect,
      })
      .from(decisionItemsTable)
      .innerJoin(meetingsTable, eq(decisionItemsTable.meetingId, meetingsTable.id))
      .leftJoin(workgroupsTable, eq(meetingsTable.workgroupId, workgroupsTable.id))
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(meetingsTable.meetingDate), asc(decisionItemsTable.id));

    const rows = filter.limit !== undefined ? await query.limit(filter.limit) : await query;
    return rows.map((r) => ({
      id: r.id,
      meetingId: r.meetingId,
      workgroupName: r.workgroupName ?? "Unknown workgroup",
      date: r.meetingDate,
      decision: r.decision,
      rationale: r.rationale,
      effect: r.effect,
    }));
  }

  // Relationships
  async listRelationships(entityId: string): Promise<RelationshipRecord[]> {
    return this.db
      .select()
      .from(relationshipTriplesTable)
      .where(or(eq(relationshipTriplesTable.subjectId, entityId), eq(relationshipTriplesTable.objectId, entityId)))
      .orderBy(asc(relationshipTriplesTable.sourceMeetingId), asc(relationshipTriplesTable.id));
  }
}

export const storage = new DbArchiveStore();
