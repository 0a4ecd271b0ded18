/**
 * Query Orchestrator
 *
 * Purpose:
 * Single entry point for answering a question over the archive. Routes the
 * question by intent, runs the matching path, verifies the citations and
 * writes the audit record.
 *
 * Paths:
 * - quantitative   -> QuantitativeAggregator (counts from the entity store)
 * - topic          -> topic handler
 * - decision_list  -> decision-list handler
 * - generic        -> vector search -> evidence filters -> generation -> verification
 * - relationship   -> executeRelationshipQuery only, never from text
 *                     (person or workgroup by name, meeting by record id)
 *
 * Whatever happens on a path, enforceEvidenceInvariant runs last: no result
 * claims evidence without at least one valid citation, and every citation
 * of a result that claims evidence is valid.
 *
 * Layer: Orchestration
 */

import { v4 as uuidv4 } from "uuid";
import { SENTINEL_RECORD_IDS } from "../config/constants";
import { classifyIntent } from "../decisionLayer/intent";
import { EntityResolver } from "../entities/resolver";
import {
  extractCitations,
  hasCredibleEvidence,
  meetingCitation,
  noEvidenceCitation,
} from "../evidence/citations";
import { runEvidencePipeline } from "../evidence/pipeline";
import { answerDecisionListQuestion } from "../handlers/decisions";
import { QuantitativeAggregator } from "../handlers/quantitative";
import { answerRelationshipQuery, type RelationshipKind } from "../handlers/relationships";
import { answerTopicQuestion } from "../handlers/topics";
import type { StructuredAnswer } from "../handlers/types";
import { NO_EXTRACTION, type Citation, type QueryIntent, type QueryOutcome, type QueryResult, type VerificationResult } from "../query/types";
import type { AnswerGenerator, EvidenceRetriever } from "../rag/types";
import type { ArchiveStore } from "../storage";
import { toAuditRecord, type AuditSink } from "../audit/auditWriter";
import { classifyQueryError } from "../utils/errorHandler";
import { QueryLogger, logInfo, logWarn } from "../utils/logger";
import { applyNegativeResponsePolicy } from "../verification/negativeResponse";
import { isValidCitation, verifyCitations } from "../verification/citationVerifier";
import {
  genericErrorMessage,
  invalidInputMessage,
  noEvidenceMessage,
  timeoutMessage,
  unavailableMessage,
  verificationFailureMessage,
} from "../verification/messages";
import { validateQueryText } from "./queryValidation";
import { withTimeout } from "./timeout";

export type QueryOrchestratorDeps = {
  retriever: EvidenceRetriever;
  generator: AnswerGenerator;
  store: ArchiveStore;
  auditSink: AuditSink;
  resolver?: EntityResolver;
  aggregator?: QuantitativeAggregator;
};

export type QueryOrchestratorConfig = {
  seed: number;
  topK: number;
  timeoutMs: number;
  /** Recorded on results that were not produced by the answer model. */
  modelVersion: string;
  now?: () => Date;
};

/**
 * A result before the invariant guard and the audit write.
 */
export type DraftResult = {
  answer: string;
  citations: Citation[];
  evidenceFound: boolean;
  verification: VerificationResult | null;
  outcome: QueryOutcome;
  modelVersion?: string;
  method?: string;
  discrepancy?: string;
};

/**
 * Last check on every path. Drops invalid citations from a result that
 * claims evidence, and withdraws the claim when none are left.
 */
export function enforceEvidenceInvariant(draft: DraftResult): DraftResult {
  if (!draft.evidenceFound) {
    return draft;
  }
  const valid = draft.citations.filter(isValidCitation);
  if (valid.length > 0) {
    return valid.length === draft.citations.length ? draft : { ...draft, citations: valid };
  }

  logWarn("[Orchestrator] Evidence claimed without a valid citation; downgrading result", {
    outcome: draft.outcome,
    citationCount: draft.citations.length,
  });
  return {
    ...draft,
    citations: [],
    evidenceFound: false,
    outcome: draft.outcome === "answered" ? "verification_failed" : draft.outcome,
  };
}

function entityStorageCitation(description: string): Citation {
  return {
    recordId: SENTINEL_RECORD_IDS.ENTITY_STORAGE,
    date: "",
    groupingName: null,
    excerpt: description,
    extraction: NO_EXTRACTION,
  };
}

export class QueryOrchestrator {
  private readonly resolver: EntityResolver;
  private readonly aggregator: QuantitativeAggregator;
  private readonly now: () => Date;

  constructor(
    private readonly deps: QueryOrchestratorDeps,
    private readonly config: QueryOrchestratorConfig,
  ) {
    this.now = config.now ?? (() => new Date());
    this.resolver = deps.resolver ?? new EntityResolver(deps.store);
    this.aggregator = deps.aggregator ?? new QuantitativeAggregator(deps.store, { now: this.now });
  }

  async executeQuery(text: string, callerId?: string): Promise<QueryResult> {
    const queryId = uuidv4();
    const qlog = new QueryLogger(queryId, callerId);
    qlog.info(`[Orchestrator] Query received`, { queryLength: text.length });

    const problem = validateQueryText(text);
    if (problem) {
      qlog.info(`[Orchestrator] Rejected input: ${problem}`);
      return this.finish(queryId, text, callerId, "generic", qlog, {
        answer: invalidInputMessage(problem),
        citations: [],
        evidenceFound: false,
        verification: null,
        outcome: "invalid_input",
      });
    }

    let intent: QueryIntent = "generic";
    let draft: DraftResult;
    try {
      const workgroups = await this.call("entity store", this.deps.store.listEntities("workgroup"));
      const groupingNames = workgroups.flatMap((w) => [w.name, ...w.alternateNames]);
      const classification = classifyIntent(text, { groupingNames });
      intent = classification.intent;
      qlog.info(`[Orchestrator] Intent ${intent} (rule ${classification.matchedRule})`, { intent });

      switch (intent) {
        case "quantitative":
          draft = await this.runQuantitative(text, qlog);
          break;
        case "topic":
          draft = this.fromStructured(
            await this.call(
              "topic lookup",
              answerTopicQuestion(text, this.deps.store, { now: this.now(), correlationId: qlog.getCorrelationId() }),
            ),
          );
          break;
        case "decision_list":
          draft = this.fromStructured(
            await this.call(
              "decision lookup",
              answerDecisionListQuestion(text, this.deps.store, { now: this.now(), correlationId: qlog.getCorrelationId() }),
            ),
          );
          break;
        default:
          draft = await this.runGeneric(text, qlog);
          break;
      }
    } catch (err) {
      draft = this.fromError(err, qlog);
    }

    return this.finish(queryId, text, callerId, intent, qlog, draft);
  }

  async executeRelationshipQuery(kind: RelationshipKind, name: string, callerId?: string): Promise<QueryResult> {
    const queryId = uuidv4();
    const qlog = new QueryLogger(queryId, callerId);
    const userInput = `relationships ${kind} "${name}"`;
    qlog.info(`[Orchestrator] Relationship query for ${kind}`, { intent: "relationship" });

    if (!name || !name.trim()) {
      return this.finish(queryId, userInput, callerId, "relationship", qlog, {
        answer: kind === "meeting" ? "Please provide a meeting record id." : `Please provide a ${kind} name.`,
        citations: [],
        evidenceFound: false,
        verification: null,
        outcome: "invalid_input",
      });
    }

    let draft: DraftResult;
    try {
      draft = this.fromStructured(
        await this.call(
          "relationship lookup",
          answerRelationshipQuery(kind, name, this.resolver, this.deps.store, qlog.getCorrelationId()),
        ),
      );
    } catch (err) {
      draft = this.fromError(err, qlog);
    }

    return this.finish(queryId, userInput, callerId, "relationship", qlog, draft);
  }

  clearEntityCache(): void {
    const size = this.resolver.cache.size;
    this.resolver.clearCache();
    logInfo(`[Orchestrator] Entity cache cleared (${size} entries)`);
  }

  private call<T>(label: string, operation: Promise<T>): Promise<T> {
    return withTimeout(label, this.config.timeoutMs, operation);
  }

  private async runQuantitative(text: string, qlog: QueryLogger): Promise<DraftResult> {
    qlog.startStage("aggregate");
    const aggregate = await this.call("quantitative aggregation", this.aggregator.answer(text));
    qlog.endStage("aggregate");

    if (!aggregate.method) {
      throw new Error(`Aggregate answer from ${aggregate.source} has no method`);
    }
    qlog.info(`[Orchestrator] Aggregate ${aggregate.count} via ${aggregate.method}`, { source: aggregate.source });

    const computed = { method: aggregate.method, discrepancy: aggregate.discrepancy };
    const description = aggregate.citations[0]?.description ?? aggregate.method;
    if (aggregate.sampledRecords.length === 0) {
      return {
        answer: aggregate.answer,
        citations: [entityStorageCitation(description)],
        evidenceFound: false,
        verification: null,
        outcome: "answered",
        ...computed,
      };
    }

    const citations = aggregate.sampledRecords.map((m) => meetingCitation(m, description));
    return { ...this.verifiedStructured(aggregate.answer, citations), ...computed };
  }

  private fromStructured(result: StructuredAnswer): DraftResult {
    if (!result.evidenceFound) {
      return {
        answer: result.answer,
        citations: result.citations,
        evidenceFound: false,
        verification: null,
        outcome: "no_evidence",
      };
    }
    return this.verifiedStructured(result.answer, result.citations);
  }

  private verifiedStructured(answer: string, citations: Citation[]): DraftResult {
    const verification = verifyCitations(citations, false);
    if (!verification.verified) {
      return {
        answer: verificationFailureMessage(verification),
        citations: [],
        evidenceFound: false,
        verification,
        outcome: "verification_failed",
      };
    }
    return { answer, citations, evidenceFound: true, verification, outcome: "answered" };
  }

  private async runGeneric(text: string, qlog: QueryLogger): Promise<DraftResult> {
    qlog.startStage("search");
    const retrieved = await this.call("vector search", this.deps.retriever.search(text, this.config.topK));
    qlog.endStage("search");

    const filtered = await this.call(
      "evidence filtering",
      runEvidencePipeline(text, retrieved, {
        store: this.deps.store,
        now: this.now(),
        correlationId: qlog.getCorrelationId(),
      }),
    );
    qlog.info(`[Orchestrator] Evidence ${filtered.evidence.length}/${retrieved.length} after filters`, {
      filters: filtered.applied,
    });

    if (filtered.anomaly || !hasCredibleEvidence(filtered.evidence)) {
      return {
        answer: noEvidenceMessage(),
        citations: [noEvidenceCitation()],
        evidenceFound: false,
        verification: null,
        outcome: "no_evidence",
      };
    }

    qlog.startStage("generate");
    const generated = await this.call(
      "answer generation",
      this.deps.generator.generate(text, filtered.evidence, { seed: this.config.seed }),
    );
    qlog.endStage("generate");

    const policy = applyNegativeResponsePolicy(generated.text, extractCitations(filtered.evidence));
    if (policy.negative) {
      qlog.info("[Orchestrator] Generated answer is negative; citations withdrawn");
      return {
        answer: generated.text || noEvidenceMessage(),
        citations: policy.citations.length > 0 ? policy.citations : [noEvidenceCitation()],
        evidenceFound: false,
        verification: null,
        outcome: "no_evidence",
        modelVersion: generated.modelVersion,
      };
    }

    const verification = verifyCitations(policy.citations, true);
    if (!verification.verified) {
      qlog.warn(`[Orchestrator] Verification failed: ${verification.failure}`, {
        citationCount: verification.citationCount,
      });
      return {
        answer: verificationFailureMessage(verification),
        citations: [],
        evidenceFound: false,
        verification,
        outcome: "verification_failed",
        modelVersion: generated.modelVersion,
      };
    }

    return {
      answer: generated.text,
      citations: policy.citations.filter(isValidCitation),
      evidenceFound: true,
      verification,
      outcome: "answered",
      modelVersion: generated.modelVersion,
    };
  }

  private fromError(err: unknown, qlog: QueryLogger): DraftResult {
    const classified = classifyQueryError(err);
    const base = { citations: [], evidenceFound: false, verification: null };

    switch (classified.type) {
      case "invalid_input":
        qlog.warn(`[Orchestrator] Invalid input: ${classified.errorMessage}`);
        return { ...base, answer: classified.errorMessage, outcome: "invalid_input" };
      case "timeout":
        qlog.warn(`[Orchestrator] Timed out: ${classified.errorMessage}`);
        return { ...base, answer: timeoutMessage(this.config.timeoutMs), outcome: "timeout" };
      case "unavailable":
        qlog.error(`[Orchestrator] Collaborator unavailable`, err, { errorCode: classified.errorCode });
        return { ...base, answer: unavailableMessage(), outcome: "unavailable" };
      case "error":
        qlog.error(`[Orchestrator] Query failed`, err, { errorCode: classified.errorCode });
        return { ...base, answer: genericErrorMessage(), outcome: "error" };
    }
  }

  private async finish(
    queryId: string,
    userInput: string,
    callerId: string | undefined,
    intent: QueryIntent,
    qlog: QueryLogger,
    draft: DraftResult,
  ): Promise<QueryResult> {
    const guarded = enforceEvidenceInvariant(draft);
    const result: QueryResult = {
      queryId,
      answer: guarded.answer,
      citations: guarded.citations,
      evidenceFound: guarded.evidenceFound,
      intent,
      seed: this.config.seed,
      modelVersion: guarded.modelVersion ?? this.config.modelVersion,
      timestamp: this.now().toISOString(),
      auditLogPath: null,
      verification: guarded.verification,
      outcome: guarded.outcome,
      method: guarded.method ?? null,
      discrepancy: guarded.discrepancy ?? null,
    };

    try {
      result.auditLogPath = await this.call(
        "audit write",
        this.deps.auditSink.append(queryId, toAuditRecord(result, userInput, callerId)),
      );
    } catch (err) {
      qlog.error("[Orchestrator] Audit write failed; returning result without audit path", err);
    }

    qlog.info(`[Orchestrator] Done: ${result.outcome}`, {
      intent,
      evidenceFound: result.evidenceFound,
      citationCount: result.citations.length,
    });
    return result;
  }
}
