/**
 * Unit Tests: Intent Classification
 *
 * Rule order is topic -> decision_list -> quantitative -> generic, and the
 * classifier never returns "relationship".
 */

import { describe, it, expect } from "vitest";
import {
  INTENT_RULES,
  classifyIntent,
  hasDateReference,
  hasListingKeyword,
  hasStatisticalKeyword,
  mentionsGrouping,
} from "../decisionLayer/intent";

const context = { groupingNames: ["Treasury Guild", "Archives Workgroup"] };

describe("Intent classification", () => {
  describe("rules", () => {
    it("are ordered topic, decision_list, quantitative, generic", () => {
      expect(INTENT_RULES.map((r) => r.name)).toEqual(["topic", "decision_list", "quantitative", "generic"]);
    });
  });

  describe("topic", () => {
    it("needs a topic keyword plus a grouping or a date", () => {
      expect(classifyIntent("What topics did the Archives Workgroup cover?", context).intent).toBe("topic");
      expect(classifyIntent("What was discussed in the Treasury Guild?", context).intent).toBe("topic");
      expect(classifyIntent("Which topics came up in March 2025?", context).intent).toBe("topic");
    });

    it("falls through without scope", () => {
      expect(classifyIntent("What was discussed about budgets?", context).intent).toBe("generic");
    });
  });

  describe("decision_list", () => {
    it("needs decision and listing keywords plus scope", () => {
      const result = classifyIntent("List the decisions made by the Treasury Guild", context);
      expect(result.intent).toBe("decision_list");
      expect(result.matchedRule).toBe("decision_list");
      expect(classifyIntent("Show all decisions from 2025", context).intent).toBe("decision_list");
    });

    it("falls back to quantitative for an unscoped listing", () => {
      expect(classifyIntent("List all decisions", context).intent).toBe("quantitative");
    });
  });

  describe("quantitative", () => {
    it.each([
      "How many meetings are there?",
      "What is the average number of meetings per workgroup?",
      "Total count of people",
      "List all workgroups",
      "Show the monthly trend",
    ])("classifies %s", (question) => {
      expect(classifyIntent(question, context).intent).toBe("quantitative");
    });
  });

  describe("generic", () => {
    it.each(["What was said about AGI?", "Summarize the onboarding process", "Who proposed the new budget?"])(
      "classifies %s",
      (question) => {
        expect(classifyIntent(question, context).intent).toBe("generic");
      },
    );
  });

  it("is deterministic", () => {
    const question = "What topics did the Treasury Guild discuss last month?";
    expect(classifyIntent(question, context)).toEqual(classifyIntent(question, context));
  });

  it("never returns relationship", () => {
    const questions = [
      "Who is related to the Treasury Guild?",
      "What relationships does Stephen have?",
      "Show relationships for the Archives Workgroup",
    ];
    for (const q of questions) {
      expect(classifyIntent(q, context).intent).not.toBe("relationship");
    }
  });

  describe("predicates", () => {
    it("match whole words only", () => {
      expect(hasListingKeyword("Show me")).toBe(true);
      expect(hasListingKeyword("Showcase")).toBe(false);
      expect(hasStatisticalKeyword("the maximum")).toBe(true);
      expect(hasStatisticalKeyword("minutes")).toBe(false);
    });

    it("detect known grouping names", () => {
      expect(mentionsGrouping("budget of the treasury guild", ["Treasury Guild"])).toBe(true);
      expect(mentionsGrouping("budget of the guild", ["Treasury Guild"])).toBe(false);
    });

    it("detect absolute and relative dates", () => {
      expect(hasDateReference("in March 2025")).toBe(true);
      expect(hasDateReference("last month")).toBe(true);
      expect(hasDateReference("anything decided this quarter")).toBe(true);
      expect(hasDateReference("what came up recently")).toBe(true);
      expect(hasDateReference("every so often")).toBe(false);
      expect(hasDateReference("the last item on the agenda")).toBe(false);
    });
  });
});
