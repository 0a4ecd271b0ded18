/**
 * Integration Tests: Query Orchestrator
 *
 * Every collaborator is an in-process fake. Each test checks the outcome,
 * the evidence flag and the citations, and that the evidence invariant
 * holds on the result.
 */

import { describe, it, expect } from "vitest";
import { validate as isUuid } from "uuid";
import { z } from "zod";
import { EntityResolver } from "../entities/resolver";
import { AGGREGATION_METHODS, QuantitativeAggregator } from "../handlers/quantitative";
import { QueryOrchestrator, enforceEvidenceInvariant, type QueryOrchestratorDeps } from "../orchestrator/queryOrchestrator";
import type { EvidenceItem, QueryResult } from "../query/types";
import { isValidCitation } from "../verification/citationVerifier";
import { ServiceUnavailableError } from "../utils/errorHandler";
import { genericErrorMessage } from "../verification/messages";
import {
  FailingAuditSink,
  FakeGenerator,
  FakeRetriever,
  InMemoryArchiveStore,
  MemoryAuditSink,
  entity,
  evidence,
  meeting,
  never,
  rec,
  unextracted,
} from "./fakes";

const FIXED_NOW = new Date("2025-06-15T12:00:00.000Z");

const CONFIG = {
  seed: 42,
  topK: 10,
  timeoutMs: 50,
  modelVersion: "openai:gpt-4o",
  now: () => FIXED_NOW,
};

function archive(): InMemoryArchiveStore {
  return new InMemoryArchiveStore({
    entities: [
      entity("workgroup", "wg-archives", "Archives Workgroup"),
      entity("workgroup", "wg-treasury", "Treasury Guild"),
      entity("person", "p-stephen", "Stephen"),
      entity("person", "p-maria", "Maria"),
    ],
    meetings: [
      meeting({ id: rec(1), date: "2025-01-08", topics: ["Budget", "Onboarding"], participantIds: ["p-stephen"] }),
      meeting({ id: rec(2), date: "2025-01-22", topics: ["budget"] }),
      meeting({ id: rec(3), date: "2025-02-05", workgroupId: "wg-treasury", workgroupName: "Treasury Guild" }),
    ],
    decisions: [
      {
        id: "d-1",
        meetingId: rec(3),
        workgroupName: "Treasury Guild",
        date: "2025-02-05",
        decision: "Raise budget",
        rationale: null,
        effect: null,
      },
    ],
    relationships: [
      {
        id: "r-1",
        subjectId: "p-stephen",
        subjectType: "person",
        subjectName: "Stephen",
        relationship: "attended",
        objectId: rec(1),
        objectType: "meeting",
        objectName: "Archives Workgroup 2025-01-08",
        sourceMeetingId: rec(1),
      },
    ],
  });
}

function build(overrides: Omit<Partial<QueryOrchestratorDeps>, "store"> & { store?: InMemoryArchiveStore } = {}, items: EvidenceItem[] = []) {
  const store = overrides.store ?? archive();
  const retriever = new FakeRetriever(items);
  const generator = new FakeGenerator();
  const auditSink = new MemoryAuditSink();
  const deps: QueryOrchestratorDeps = { retriever, generator, store, auditSink, ...overrides };
  return { orchestrator: new QueryOrchestrator(deps, CONFIG), store, retriever, generator, auditSink };
}

function expectInvariant(result: QueryResult): void {
  if (result.evidenceFound) {
    expect(result.citations.length).toBeGreaterThan(0);
    expect(result.citations.every(isValidCitation)).toBe(true);
  }
}

describe("QueryOrchestrator", () => {
  describe("quantitative path", () => {
    it("answers a meeting count from the entity store with real-record citations", async () => {
      const store = new InMemoryArchiveStore({
        meetings: Array.from({ length: 42 }, (_, i) => meeting({ id: rec(i + 1) })),
      });
      const { orchestrator, retriever } = build({ store });

      const result = await orchestrator.executeQuery("How many meetings are there?");

      expect(result.intent).toBe("quantitative");
      expect(result.outcome).toBe("answered");
      expect(result.answer).toBe("There are 42 meetings in the archive.");
      expect(result.evidenceFound).toBe(true);
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(1), rec(2), rec(3), rec(4), rec(5)]);
      expect(result.verification?.verified).toBe(true);
      expect(result.modelVersion).toBe("openai:gpt-4o");
      expect(retriever.calls).toHaveLength(0);
      expectInvariant(result);
    });

    it("cites entity storage without claiming evidence for an empty archive", async () => {
      const { orchestrator } = build({ store: new InMemoryArchiveStore() });

      const result = await orchestrator.executeQuery("How many meetings are there?");

      expect(result.answer).toBe("There are 0 meetings in the archive.");
      expect(result.evidenceFound).toBe(false);
      expect(result.citations.map((c) => c.recordId)).toEqual(["entity-storage"]);
      expect(result.method).toBe(AGGREGATION_METHODS.MEETING_COUNT);
    });

    it("counts decisions inside the named month and records the method", async () => {
      const { orchestrator, auditSink } = build();

      const result = await orchestrator.executeQuery("How many decisions were made in February 2025?");

      expect(result.intent).toBe("quantitative");
      expect(result.answer).toBe("There is 1 decision recorded for all workgroups from 2025-02-01 to 2025-02-28.");
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(3)]);
      expect(result.method).toBe(AGGREGATION_METHODS.DECISION_COUNT);
      expect(result.discrepancy).toBeNull();
      expect(auditSink.records.get(result.queryId)?.method).toBe(AGGREGATION_METHODS.DECISION_COUNT);
      expect(auditSink.records.get(result.queryId)?.discrepancy).toBeNull();
    });

    it("carries a source discrepancy onto the result and the audit record", async () => {
      const store = new InMemoryArchiveStore({ meetings: [meeting({ id: rec(1) })] });
      const aggregator = new QuantitativeAggregator(store, {
        fetchSource: async () => [{ workgroup_id: "wg-a", meetingInfo: { date: "2025-01-01" } }, { workgroup_id: "wg-b" }],
      });
      const { orchestrator, auditSink } = build({ store, aggregator });

      const result = await orchestrator.executeQuery("How many meetings are in https://example.org/meetings.json?");

      const discrepancy =
        "Entity storage has 1 meetings, but source has 2 total entries (2 unique meetings). 1 meeting(s) not yet ingested into entity storage.";
      expect(result.method).toBe(AGGREGATION_METHODS.SOURCE_COUNT);
      expect(result.discrepancy).toBe(discrepancy);
      expect(auditSink.records.get(result.queryId)?.method).toBe(AGGREGATION_METHODS.SOURCE_COUNT);
      expect(auditSink.records.get(result.queryId)?.discrepancy).toBe(discrepancy);
    });
  });

  describe("generic path", () => {
    it("keeps AGI evidence and drops AGIX", async () => {
      const items = [
        evidence({ recordId: rec(1), text: "The AGI roadmap was reviewed." }),
        evidence({ recordId: rec(2), text: "AGIX token price was noted." }),
      ];
      const { orchestrator, generator } = build({}, items);

      const result = await orchestrator.executeQuery("What was said about AGI?");

      expect(result.intent).toBe("generic");
      expect(generator.calls[0].evidence.map((e) => e.recordId)).toEqual([rec(1)]);
      expect(generator.calls[0].options).toEqual({ seed: 42 });
      expect(result.outcome).toBe("answered");
      expect(result.evidenceFound).toBe(true);
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(1)]);
      expect(result.modelVersion).toBe("openai:test-model");
      expect(result.seed).toBe(42);
      expectInvariant(result);
    });

    it("keeps only the March 2025 evidence", async () => {
      const items = [
        evidence({ recordId: rec(1), date: "2025-03-05" }),
        evidence({ recordId: rec(2), date: "2025-02-28" }),
        evidence({ recordId: rec(3), date: "2025-03-31" }),
        evidence({ recordId: rec(4), date: "2025-04-01" }),
        evidence({ recordId: rec(5), date: "2025-03-15" }),
      ];
      const { orchestrator, generator } = build({}, items);

      const result = await orchestrator.executeQuery("What happened in March 2025?");

      expect(generator.calls[0].evidence).toHaveLength(3);
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(1), rec(3), rec(5)]);
      expect(result.citations.map((c) => c.date)).toEqual(["2025-03-05", "2025-03-31", "2025-03-15"]);
    });

    it("fails verification when no citation carries extraction metadata", async () => {
      const items = [
        unextracted(evidence({ recordId: rec(1), text: "Budget review" })),
        unextracted(evidence({ recordId: rec(2), text: "Budget follow-up" })),
      ];
      const { orchestrator } = build({}, items);

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("verification_failed");
      expect(result.verification?.failure).toBe("missing_entity_extraction");
      expect(result.answer.startsWith("**Citations lack entity extraction verification.**")).toBe(true);
      expect(result.evidenceFound).toBe(false);
      expect(result.citations).toEqual([]);
    });

    it("withdraws citations from a negative answer", async () => {
      const items = [evidence({ recordId: rec(1), text: "Budget review" })];
      const { orchestrator } = build({ generator: new FakeGenerator("AGI is not mentioned in these notes.") }, items);

      const result = await orchestrator.executeQuery("Summarize what happened with AGI");

      expect(result.outcome).toBe("no_evidence");
      expect(result.answer).toBe("AGI is not mentioned in these notes.");
      expect(result.evidenceFound).toBe(false);
      expect(result.citations.map((c) => c.recordId)).toEqual(["no-evidence"]);
    });

    it("answers no evidence without generating when a filter empties the evidence", async () => {
      const items = [evidence({ recordId: rec(1), text: "Budget review" })];
      const { orchestrator, generator } = build({}, items);

      const result = await orchestrator.executeQuery("Tell me about Zeta");

      expect(result.outcome).toBe("no_evidence");
      expect(result.evidenceFound).toBe(false);
      expect(result.citations.map((c) => c.recordId)).toEqual(["no-evidence"]);
      expect(generator.calls).toHaveLength(0);
    });

    it("answers no evidence when retrieval finds nothing", async () => {
      const { orchestrator, generator } = build();

      const result = await orchestrator.executeQuery("Summarize the onboarding process");

      expect(result.outcome).toBe("no_evidence");
      expect(result.answer.startsWith("**No relevant archive data found**")).toBe(true);
      expect(generator.calls).toHaveLength(0);
    });
  });

  describe("structured handlers", () => {
    it("lists topics for a named workgroup", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeQuery("What topics did the Archives Workgroup discuss?");

      expect(result.intent).toBe("topic");
      expect(result.answer).toBe("Topics discussed in Archives Workgroup: Budget (2), Onboarding (1).");
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(1), rec(2)]);
      expect(result.evidenceFound).toBe(true);
      expectInvariant(result);
    });

    it("lists decisions for a named workgroup", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeQuery("List the decisions of the Treasury Guild");

      expect(result.intent).toBe("decision_list");
      expect(result.answer).toBe("Found 1 decision(s) for Treasury Guild:\n1. Raise budget (Treasury Guild, 2025-02-05)");
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(3)]);
      expect(result.outcome).toBe("answered");
    });

    it("scopes topics to last month", async () => {
      const store = new InMemoryArchiveStore({
        meetings: [
          meeting({ id: rec(11), date: "2025-01-08", topics: ["Budget"] }),
          meeting({ id: rec(12), date: "2025-01-22", topics: ["Budget"] }),
          meeting({ id: rec(13), date: "2025-03-12", topics: ["Hiring"] }),
          meeting({ id: rec(14), date: "2025-05-14", topics: ["Onboarding"] }),
        ],
      });
      const { orchestrator } = build({ store });

      const result = await orchestrator.executeQuery("What topics were discussed last month?");

      expect(result.intent).toBe("topic");
      expect(result.answer).toBe("Topics discussed in all workgroups from 2025-05-01 to 2025-05-31: Onboarding (1).");
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(14)]);
      expectInvariant(result);
    });

    it("reports no topics without claiming evidence", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeQuery("What topics did the Treasury Guild discuss?");

      expect(result.answer).toBe("No topics found for Treasury Guild.");
      expect(result.outcome).toBe("no_evidence");
      expect(result.evidenceFound).toBe(false);
    });
  });

  describe("relationship queries", () => {
    it("resolves a decorated name and cites the source meeting", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeRelationshipQuery("person", "Stephen [ORG]", "caller-1");

      expect(result.intent).toBe("relationship");
      expect(result.outcome).toBe("answered");
      expect(result.answer).toBe("Relationships for Stephen (1):\n- Stephen -> attended -> Archives Workgroup 2025-01-08");
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(1)]);
      expectInvariant(result);
    });

    it("suggests close names for an unknown person", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeRelationshipQuery("person", "Stephanie");

      expect(result.answer).toBe("Person 'Stephanie' not found.\n\nDid you mean: Stephen?");
      expect(result.outcome).toBe("no_evidence");
      expect(result.evidenceFound).toBe(false);
    });

    it("describes a meeting looked up by record id", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeRelationshipQuery("meeting", `{${rec(1)}}`);

      expect(result.outcome).toBe("answered");
      expect(result.answer).toBe(
        [
          `Meeting ${rec(1)} (2025-01-08):`,
          "- Workgroup: Archives Workgroup",
          "- Participants (1): Stephen",
          "- Decisions: none recorded",
        ].join("\n"),
      );
      expect(result.citations.map((c) => c.recordId)).toEqual([rec(1)]);
      expectInvariant(result);
    });

    it("rejects a meeting lookup that is not a record id", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeRelationshipQuery("meeting", "last tuesday");

      expect(result.outcome).toBe("invalid_input");
      expect(result.answer).toBe("'last tuesday' is not a meeting record id.");
      expect(result.evidenceFound).toBe(false);
    });

    it("asks for a record id when the meeting is blank", async () => {
      const { orchestrator } = build();

      const result = await orchestrator.executeRelationshipQuery("meeting", "");

      expect(result.answer).toBe("Please provide a meeting record id.");
      expect(result.outcome).toBe("invalid_input");
    });

    it("rejects an empty name", async () => {
      const { orchestrator, store } = build();

      const result = await orchestrator.executeRelationshipQuery("workgroup", "  ");

      expect(result.outcome).toBe("invalid_input");
      expect(store.calls).toEqual({});
    });

    it("clears the entity cache on request", async () => {
      const store = archive();
      const resolver = new EntityResolver(store);
      const { orchestrator } = build({ store, resolver });

      await orchestrator.executeRelationshipQuery("person", "Stephen");
      expect(resolver.cache.size).toBe(1);

      orchestrator.clearEntityCache();
      expect(resolver.cache.size).toBe(0);
    });
  });

  describe("input validation", () => {
    it.each([
      ["", "Please provide a question or query."],
      ["hi", "Your query seems too short."],
      ["???", "Please provide a meaningful question."],
    ])("rejects %j before calling any collaborator", async (text, prefix) => {
      const { orchestrator, store, retriever } = build();

      const result = await orchestrator.executeQuery(text);

      expect(result.outcome).toBe("invalid_input");
      expect(result.answer.startsWith(prefix)).toBe(true);
      expect(result.evidenceFound).toBe(false);
      expect(store.calls).toEqual({});
      expect(retriever.calls).toHaveLength(0);
    });
  });

  describe("failures", () => {
    it("reports a timeout when a collaborator does not answer", async () => {
      const retriever = { search: () => never<EvidenceItem[]>() };
      const { orchestrator } = build({ retriever });

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("timeout");
      expect(result.answer.startsWith("**Query timeout**")).toBe(true);
      expect(result.evidenceFound).toBe(false);
      expect(result.citations).toEqual([]);
    });

    it("reports unavailable rather than no evidence when the index is down", async () => {
      const retriever = { search: () => Promise.reject(new ServiceUnavailableError("Vector index")) };
      const { orchestrator } = build({ retriever });

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("unavailable");
      expect(result.evidenceFound).toBe(false);
    });

    it("treats a refused connection as unavailable", async () => {
      const retriever = { search: () => Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:5432")) };
      const { orchestrator } = build({ retriever });

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("unavailable");
    });

    it("turns an unexpected error into an error outcome with no citations", async () => {
      const items = [evidence({ recordId: rec(1), text: "Budget review" })];
      const generator = { generate: () => Promise.reject(new Error("boom")) };
      const { orchestrator } = build({ generator }, items);

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("error");
      expect(result.citations).toEqual([]);
      expect(result.evidenceFound).toBe(false);
    });

    it("hides a malformed retrieval payload behind the generic error", async () => {
      const parsed = z.object({ distance: z.number() }).safeParse({ distance: "near" });
      const retriever = {
        search: () => Promise.reject(parsed.success ? new Error("row parsed") : parsed.error),
      };
      const { orchestrator } = build({ retriever });

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("error");
      expect(result.answer).toBe(genericErrorMessage());
      expect(result.citations).toEqual([]);
    });

    it("returns the answer when the audit write fails", async () => {
      const items = [evidence({ recordId: rec(1), text: "Budget review" })];
      const { orchestrator } = build({ auditSink: new FailingAuditSink() }, items);

      const result = await orchestrator.executeQuery("Summarize the budget review");

      expect(result.outcome).toBe("answered");
      expect(result.auditLogPath).toBeNull();
    });
  });

  describe("audit trail", () => {
    it("writes one record per query under a fresh UUID", async () => {
      const items = [evidence({ recordId: rec(1), text: "Budget review" })];
      const { orchestrator, auditSink } = build({}, items);

      const first = await orchestrator.executeQuery("Summarize the budget review", "caller-1");
      const second = await orchestrator.executeQuery("Summarize the budget review", "caller-1");

      expect(isUuid(first.queryId)).toBe(true);
      expect(first.queryId).not.toBe(second.queryId);
      expect(first.auditLogPath).toBe(`memory://${first.queryId}`);
      expect(first.timestamp).toBe("2025-06-15T12:00:00.000Z");

      expect(auditSink.records.get(first.queryId)).toEqual({
        queryId: first.queryId,
        callerId: "caller-1",
        userInput: "Summarize the budget review",
        intent: "generic",
        answer: "The Archives Workgroup agreed to publish the summary.",
        citations: [{ recordId: rec(1), date: "", groupingName: "Archives Workgroup", excerpt: "Budget review" }],
        evidenceFound: true,
        outcome: "answered",
        seed: 42,
        modelVersion: "openai:test-model",
        timestamp: "2025-06-15T12:00:00.000Z",
        method: null,
        discrepancy: null,
      });
    });
  });
});

describe("enforceEvidenceInvariant", () => {
  const valid = {
    recordId: rec(1),
    date: "",
    groupingName: null,
    excerpt: "x",
    extraction: { kind: "absent" as const },
  };
  const sentinel = { ...valid, recordId: "entity-storage" };

  it("drops invalid citations from a result that claims evidence", () => {
    const guarded = enforceEvidenceInvariant({
      answer: "a",
      citations: [valid, sentinel],
      evidenceFound: true,
      verification: null,
      outcome: "answered",
    });

    expect(guarded.citations).toEqual([valid]);
    expect(guarded.evidenceFound).toBe(true);
  });

  it("withdraws the claim when no valid citation is left", () => {
    const guarded = enforceEvidenceInvariant({
      answer: "a",
      citations: [sentinel],
      evidenceFound: true,
      verification: null,
      outcome: "answered",
    });

    expect(guarded.evidenceFound).toBe(false);
    expect(guarded.citations).toEqual([]);
    expect(guarded.outcome).toBe("verification_failed");
  });

  it("leaves results without evidence alone", () => {
    const draft = { answer: "a", citations: [sentinel], evidenceFound: false, verification: null, outcome: "no_evidence" as const };

    expect(enforceEvidenceInvariant(draft)).toBe(draft);
  });
});
