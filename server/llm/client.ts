/**
 * Answer Model Client
 *
 * Purpose:
 * The two model calls the query engine makes: one evidence-answer
 * completion and one query embedding for vector search. The answer
 * provider follows from the model id; embeddings always come from OpenAI
 * because archive_chunks.embedding was written with an OpenAI model.
 *
 * Completions run at temperature 0 with the query seed. Claude's Messages
 * API takes no seed, so Claude answers are pinned by temperature only.
 *
 * Layer: LLM
 */

import { OpenAI } from "openai";
import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import Anthropic from "@anthropic-ai/sdk";
import { CLAUDE_MODELS, EMBEDDING_DIMENSIONS, GEMINI_MODELS, LLM_MODELS } from "../config/models";
import { getConfig } from "../config/env";
import { ExternalServiceError, ServiceUnavailableError } from "../utils/errorHandler";

export type Provider = "openai" | "gemini" | "claude";

export type AnswerRequest = {
  model: string;
  system: string;
  user: string;
  seed: number;
  maxTokens?: number;
};

export type AnswerCompletion = {
  text: string;
  /** provider:model, with the model as the provider reports it where it does. */
  modelVersion: string;
};

const DEFAULT_MAX_TOKENS = 1500;

const OPENAI_MODELS = new Set<string>(Object.values(LLM_MODELS));
const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export function detectProvider(model: string): Provider {
  if (OPENAI_MODELS.has(model)) return "openai";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3")) return "openai";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  throw new Error(`[LLM Client] Unknown model "${model}": cannot determine provider. Add it to the model registry in server/config/models.ts`);
}

type ApiKeyName = "OPENAI_API_KEY" | "GEMINI_API_KEY" | "ANTHROPIC_API_KEY";

function requireKey(service: string, name: ApiKeyName): string {
  const key = getConfig()[name];
  if (!key) {
    throw new ServiceUnavailableError(service, `is not configured (${name} is not set)`);
  }
  return key;
}

let _openai: OpenAI | null = null;
function openAIClient(service: string): OpenAI {
  if (!_openai) {
    _openai = new OpenAI({ apiKey: requireKey(service, "OPENAI_API_KEY") });
  }
  return _openai;
}

let _gemini: GoogleGenAI | null = null;
function geminiClient(): GoogleGenAI {
  if (!_gemini) {
    _gemini = new GoogleGenAI({ apiKey: requireKey("Answer model", "GEMINI_API_KEY") });
  }
  return _gemini;
}

let _claude: Anthropic | null = null;
function claudeClient(): Anthropic {
  if (!_claude) {
    _claude = new Anthropic({ apiKey: requireKey("Answer model", "ANTHROPIC_API_KEY") });
  }
  return _claude;
}

export function openAIAnswerParams(req: AnswerRequest) {
  return {
    model: req.model,
    messages: [
      { role: "system" as const, content: req.system },
      { role: "user" as const, content: req.user },
    ],
    temperature: 0,
    max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
    seed: req.seed,
  };
}

export function geminiAnswerParams(req: AnswerRequest): GenerateContentParameters {
  return {
    model: req.model,
    contents: [{ role: "user", parts: [{ text: req.user }] }],
    config: {
      systemInstruction: req.system,
      temperature: 0,
      maxOutputTokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
      seed: req.seed,
    },
  };
}

export function claudeAnswerParams(req: AnswerRequest) {
  return {
    model: req.model,
    max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
    system: req.system,
    messages: [{ role: "user" as const, content: req.user }],
    temperature: 0,
  };
}

function completion(provider: Provider, model: string, text: string | null | undefined): AnswerCompletion {
  return { text: (text ?? "").trim(), modelVersion: `${provider}:${model}` };
}

export async function completeAnswer(req: AnswerRequest): Promise<AnswerCompletion> {
  const provider = detectProvider(req.model);

  switch (provider) {
    case "openai": {
      const response = await openAIClient("Answer model").chat.completions.create(openAIAnswerParams(req));
      // Resolved snapshot name, e.g. gpt-4o-2024-08-06
      return completion(provider, response.model || req.model, response.choices[0]?.message?.content);
    }
    case "gemini": {
      const response = await geminiClient().models.generateContent(geminiAnswerParams(req));
      return completion(provider, req.model, response.text);
    }
    case "claude": {
      const response = await claudeClient().messages.create(claudeAnswerParams(req));
      const block = response.content.find((b) => b.type === "text");
      return completion(provider, response.model || req.model, block?.type === "text" ? block.text : "");
    }
  }
}

/**
 * Embedding of the query text, checked against the width of the stored
 * chunk embeddings.
 */
export async function embedQuery(text: string): Promise<number[]> {
  const response = await openAIClient("Embedding model").embeddings.create({
    model: getConfig().EMBEDDING_MODEL,
    input: text,
  });
  const embedding = response.data[0]?.embedding;
  if (!embedding || embedding.length !== EMBEDDING_DIMENSIONS) {
    throw new ExternalServiceError(
      "Embedding model",
      `expected a ${EMBEDDING_DIMENSIONS}-dimension embedding, got ${embedding?.length ?? 0}`,
    );
  }
  return embedding;
}
