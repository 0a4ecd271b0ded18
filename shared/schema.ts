import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, date, jsonb, integer, vector, index } from "drizzle-orm/pg-core";
import { z } from "zod";

export const ENTITY_KINDS = ["person", "workgroup", "topic"] as const;

export const workgroups = pgTable("workgroups", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  alternateNames: jsonb("alternate_names").$type<string[]>().default([]).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const people = pgTable("people", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  displayName: text("display_name").notNull(),
  alternateNames: jsonb("alternate_names").$type<string[]>().default([]).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const topics = pgTable("topics", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  alternateNames: jsonb("alternate_names").$type<string[]>().default([]).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const meetings = pgTable(
  "meetings",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    workgroupId: varchar("workgroup_id").notNull(),
    meetingDate: date("meeting_date"), // YYYY-MM-DD, null when the source had none
    hostId: varchar("host_id"),
    documenterId: varchar("documenter_id"),
    participantIds: jsonb("participant_ids").$type<string[]>().default([]).notNull(),
    topicsCovered: jsonb("topics_covered").$type<string[]>().default([]).notNull(),
    purpose: text("purpose"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [index("IDX_meetings_workgroup").on(table.workgroupId)],
);

export const decisionItems = pgTable("decision_items", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  meetingId: varchar("meeting_id").notNull(),
  decision: text("decision").notNull(),
  rationale: text("rationale"),
  effect: text("effect"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const relationshipTriples = pgTable(
  "relationship_triples",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    subjectId: varchar("subject_id").notNull(),
    subjectType: text("subject_type").notNull(),
    subjectName: text("subject_name").notNull(),
    relationship: text("relationship").notNull(), // held, attended, hosted, documented, discussed
    objectId: varchar("object_id").notNull(),
    objectType: text("object_type").notNull(),
    objectName: text("object_name").notNull(),
    sourceMeetingId: varchar("source_meeting_id").notNull(),
  },
  (table) => [index("IDX_triples_subject").on(table.subjectId), index("IDX_triples_object").on(table.objectId)],
);

export const archiveChunks = pgTable("archive_chunks", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  meetingId: varchar("meeting_id").notNull(),
  chunkIndex: integer("chunk_index").notNull(),
  content: text("content").notNull(),
  chunkType: text("chunk_type"),
  chunkEntities: jsonb("chunk_entities").$type<string[]>(),
  chunkRelationships: jsonb("chunk_relationships").$type<string[]>(),
  embedding: vector("embedding", { dimensions: 1536 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Workgroup = typeof workgroups.$inferSelect;
export type Person = typeof people.$inferSelect;
export type Topic = typeof topics.$inferSelect;
export type Meeting = typeof meetings.$inferSelect;
export type DecisionItem = typeof decisionItems.$inferSelect;
export type RelationshipTriple = typeof relationshipTriples.$inferSelect;
export type ArchiveChunk = typeof archiveChunks.$inferSelect;

// Request bodies

export const queryRequestSchema = z.object({
  question: z.string().max(2000, "Question is too long"),
  callerId: z.string().min(1).optional(),
});

export const relationshipRequestSchema = z.object({
  kind: z.enum(["person", "workgroup", "meeting"]),
  name: z.string().max(200),
  callerId: z.string().min(1).optional(),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;
export type RelationshipRequest = z.infer<typeof relationshipRequestSchema>;

// Bulk meeting source used for count cross-checks. Entries carry far more
// than this; only the fields that identify a meeting are read.

export const bulkSourceMeetingSchema = z
  .object({
    id: z.string().optional(),
    workgroup_id: z.string().nullish(),
    meetingInfo: z
      .object({
        date: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const bulkSourceSchema = z.union([z.array(bulkSourceMeetingSchema), bulkSourceMeetingSchema]);

export type BulkSourceMeeting = z.infer<typeof bulkSourceMeetingSchema>;

// Audit trail

export const auditCitationSchema = z.object({
  recordId: z.string(),
  date: z.string(),
  groupingName: z.string().nullable(),
  excerpt: z.string(),
});

export const auditRecordSchema = z.object({
  queryId: z.string().uuid(),
  callerId: z.string().nullable(),
  userInput: z.string(),
  intent: z.string(),
  answer: z.string(),
  citations: z.array(auditCitationSchema),
  evidenceFound: z.boolean(),
  outcome: z.string(),
  seed: z.number().int(),
  modelVersion: z.string(),
  timestamp: z.string(),
  method: z.string().nullable(),
  discrepancy: z.string().nullable(),
});

export type AuditRecord = z.infer<typeof auditRecordSchema>;
