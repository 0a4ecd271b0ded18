/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the models the query engine talks to.
 * The answer model actually used is ANSWER_MODEL from ./env; it must be one
 * of the models below or carry a known provider prefix.
 *
 * MODEL TIERS:
 *
 * STANDARD_REASONING - gpt-4o
 *   Default answer model. Supports a sampling seed, so answers can be
 *   reproduced for the same evidence.
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Cheaper alternative for evaluation runs.
 */

export const LLM_MODELS = {
  FAST_CLASSIFICATION: "gpt-4o-mini",
  STANDARD_REASONING: "gpt-4o",
} as const;

/**
 * Gemini models. Gemini accepts a seed in its generation config.
 */
export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

/**
 * Anthropic models. The Messages API has no seed parameter; answers from
 * these models are pinned by temperature 0 only.
 */
export const CLAUDE_MODELS = {
  SONNET: "claude-sonnet-4-5",
} as const;

/**
 * Vector width of archive_chunks.embedding. Must match the embedding model.
 */
export const EMBEDDING_DIMENSIONS = 1536;

/**
 * Token limits by model
 */
export const TOKEN_LIMITS: Record<string, number> = {
  [LLM_MODELS.FAST_CLASSIFICATION]: 1000,
  [LLM_MODELS.STANDARD_REASONING]: 1500,
  [GEMINI_MODELS.FLASH]: 2000,
  [CLAUDE_MODELS.SONNET]: 2000,
};
