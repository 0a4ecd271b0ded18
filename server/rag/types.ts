/**
 * RAG Type Definitions
 *
 * Purpose:
 * Collaborator contracts for the generic evidence path: vector search over
 * archive chunks and evidence-only answer generation. Production
 * implementations live beside this file; tests pass in-process fakes.
 *
 * Note: ArchiveChunkRow uses snake_case to match raw SQL query results.
 *
 * Layer: RAG (type definitions)
 */

import type { EvidenceItem } from "../query/types";

export interface EvidenceRetriever {
  search(queryText: string, topK: number): Promise<EvidenceItem[]>;
}

export type GenerationOptions = {
  seed: number;
};

export type GeneratedAnswer = {
  text: string;
  modelVersion: string;
};

export interface AnswerGenerator {
  generate(queryText: string, evidence: EvidenceItem[], options: GenerationOptions): Promise<GeneratedAnswer>;
}

export type ArchiveChunkRow = {
  id: string;
  meeting_id: string;
  content: string;
  chunk_type: string | null;
  chunk_entities: string[] | null;
  chunk_relationships: string[] | null;
  meeting_date: string | null;
  workgroup_name: string | null;
  distance: number;
};
