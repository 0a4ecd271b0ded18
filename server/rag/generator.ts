/**
 * Evidence Answer Generator
 *
 * Purpose:
 * Production AnswerGenerator: sends the filtered evidence to the configured
 * answer model with the evidence-only prompt. Temperature is pinned to 0 and
 * the query seed is forwarded to providers that accept one.
 *
 * Layer: RAG (generation)
 */

import { completeAnswer } from "../llm/client";
import { TOKEN_LIMITS } from "../config/models";
import { EVIDENCE_ANSWER_SYSTEM_PROMPT, buildEvidenceAnswerUserPrompt } from "../config/prompts";
import type { EvidenceItem } from "../query/types";
import type { AnswerGenerator, GeneratedAnswer, GenerationOptions } from "./types";

export class LlmAnswerGenerator implements AnswerGenerator {
  constructor(private readonly model: string) {}

  generate(queryText: string, evidence: EvidenceItem[], options: GenerationOptions): Promise<GeneratedAnswer> {
    return completeAnswer({
      model: this.model,
      system: EVIDENCE_ANSWER_SYSTEM_PROMPT,
      user: buildEvidenceAnswerUserPrompt(queryText, evidence),
      seed: options.seed,
      maxTokens: TOKEN_LIMITS[this.model],
    });
  }
}
