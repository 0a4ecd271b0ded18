import { FileAuditSink } from "../audit/auditWriter";
import { getConfig } from "../config/env";
import { EntityResolver } from "../entities/resolver";
import { QuantitativeAggregator } from "../handlers/quantitative";
import { detectProvider } from "../llm/client";
import { LlmAnswerGenerator } from "../rag/generator";
import { PgVectorRetriever } from "../rag/retriever";
import { storage } from "../storage";
import { QueryOrchestrator } from "./queryOrchestrator";

export { QueryOrchestrator, enforceEvidenceInvariant } from "./queryOrchestrator";
export type { DraftResult, QueryOrchestratorConfig, QueryOrchestratorDeps } from "./queryOrchestrator";

/**
 * Orchestrator wired to the production collaborators: Postgres entity
 * store, pgvector retrieval, the configured answer model and file audit.
 */
export function createQueryOrchestrator(): QueryOrchestrator {
  const config = getConfig();
  return new QueryOrchestrator(
    {
      retriever: new PgVectorRetriever(),
      generator: new LlmAnswerGenerator(config.ANSWER_MODEL),
      store: storage,
      auditSink: new FileAuditSink(config.AUDIT_LOG_DIR),
      resolver: new EntityResolver(storage, { threshold: config.ENTITY_SIMILARITY_THRESHOLD }),
      aggregator: new QuantitativeAggregator(storage, { defaultSourceUrl: config.MEETINGS_SOURCE_URL }),
    },
    {
      seed: config.QUERY_SEED,
      topK: config.QUERY_TOP_K,
      timeoutMs: config.QUERY_TIMEOUT_MS,
      modelVersion: `${detectProvider(config.ANSWER_MODEL)}:${config.ANSWER_MODEL}`,
    },
  );
}
