/*This file:
knows about Postgres
knows about pgvector
knows about archive_chunks, meeting_date, etc.*/

import { sql } from "drizzle-orm";
import { z } from "zod";
import { getDb } from "../db";
import { embedQuery } from "../llm/client";
import { toExtractionMetadata } from "../evidence/citations";
import type { EvidenceItem } from "../query/types";
import { logDebug } from "../utils/logger";
import type { ArchiveChunkRow, EvidenceRetriever } from "./types";

const archiveChunkRowSchema = z.object({
  id: z.string(),
  meeting_id: z.string(),
  content: z.string(),
  chunk_type: z.string().nullable(),
  chunk_entities: z.array(z.string()).nullable(),
  chunk_relationships: z.array(z.string()).nullable(),
  meeting_date: z.string().nullable(),
  workgroup_name: z.string().nullable(),
  distance: z.coerce.number(),
});

export function embeddingToVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

export function chunkRowToEvidence(row: ArchiveChunkRow): EvidenceItem {
  return {
    recordId: row.meeting_id,
    date: row.meeting_date,
    text: row.content,
    // cosine distance 0..2 -> similarity
    score: 1 - row.distance,
    groupingName: row.workgroup_name,
    extraction: toExtractionMetadata(row.chunk_type, row.chunk_entities, row.chunk_relationships),
  };
}

/**
 * Nearest archive chunks to the query by cosine distance.
 * Each chunk becomes one evidence item keyed by its meeting id.
 */
export class PgVectorRetriever implements EvidenceRetriever {
  async search(queryText: string, topK: number): Promise<EvidenceItem[]> {
    const vectorLiteral = embeddingToVectorLiteral(await embedQuery(queryText));

    const result = await getDb().execute(sql`
      SELECT
        c.id,
        c.meeting_id,
        c.content,
        c.chunk_type,
        c.chunk_entities,
        c.chunk_relationships,
        m.meeting_date::text AS meeting_date,
        w.name AS workgroup_name,
        (c.embedding <=> ${vectorLiteral}::vector) AS distance
      FROM archive_chunks c
      JOIN meetings m ON m.id = c.meeting_id
      LEFT JOIN workgroups w ON w.id = m.workgroup_id
      WHERE c.embedding IS NOT NULL
      ORDER BY distance ASC, c.id ASC
      LIMIT ${topK}
    `);

    const rows = z.array(archiveChunkRowSchema).parse(result.rows);
    logDebug(`[Retriever] ${rows.length} chunks for topK=${topK}`);
    return rows.map(chunkRowToEvidence);
  }
}
