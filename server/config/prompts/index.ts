/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained in this single location.
 *
 * Structure:
 * - answer.ts: Evidence-only answer generation
 */

export * from "./answer";
