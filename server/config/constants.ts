/**
 * Application Constants
 *
 * Centralized fixed values used across the query engine.
 * Runtime-tunable values (thresholds, timeouts, seed) live in ./env.
 */

/**
 * Reserved record ids that stand for "there was nothing to cite"
 * or for a non-record data source. They never count as evidence.
 */
export const SENTINEL_RECORD_IDS = {
  NO_EVIDENCE: "no-evidence",
  ENTITY_STORAGE: "entity-storage",
  QUANTITATIVE_ANALYSIS: "quantitative-analysis",
} as const;

export type SentinelRecordId = (typeof SENTINEL_RECORD_IDS)[keyof typeof SENTINEL_RECORD_IDS];

/**
 * Identity returned by the entity resolver when nothing in the pool matched.
 */
export const UNRESOLVED_ENTITY_ID = "00000000-0000-0000-0000-000000000000";

export const ENTITY_RESOLUTION = {
  /**
   * Decorative suffixes stripped from display names before matching,
   * applied in order. "Stephen [QADAO]" -> "Stephen".
   */
  PATTERN_RULES: [
    "\\s*\\[[^\\]]*\\]",
    "\\s*\\([^)]*\\)",
    "\\s+[-|]\\s+[^-|]+$",
    "\\s*@\\S+",
  ],

  /**
   * Affinity gained per shared record of the context grouping.
   */
  CONTEXT_AFFINITY_INCREMENT: 0.1,

  SUGGESTION_LIMIT: 3,
  SUGGESTION_MIN_SIMILARITY: 0.7,
} as const;

export const QUERY_LIMITS = {
  MIN_QUERY_LENGTH: 3,
  CITATION_EXCERPT_MAX_CHARS: 200,
  MAX_TOPICS_LISTED: 50,
  MAX_DECISIONS_LISTED: 20,
  MAX_ENTITIES_LISTED: 50,
  SAMPLED_RECORD_CITATIONS: 5,
  MAX_STRUCTURED_CITATIONS: 10,
  MAX_RELATIONSHIPS_LISTED: 50,
} as const;

export const NO_EVIDENCE_ANSWER = "No evidence found";

export const TIMEOUT_CONSTANTS = {
  /**
   * Bulk source fetch timeout for quantitative cross-checks (milliseconds).
   */
  SOURCE_FETCH_MS: 30000,
} as const;

export const RATE_LIMIT_CONSTANTS = {
  QUERY_WINDOW_MS: 60 * 1000,
} as const;
