import type { Citation } from "../query/types";

/**
 * Answer from a handler that reads the entity store directly (topics,
 * decisions, relationships). Citations always point at meeting records.
 */
export type StructuredAnswer = {
  answer: string;
  citations: Citation[];
  evidenceFound: boolean;
};
