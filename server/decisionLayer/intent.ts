/**
 * Intent Classification
 *
 * Purpose:
 * Decide which handler answers a question. Classification is rule-based and
 * deterministic: the same text and the same grouping names always give the
 * same intent. No LLM is involved.
 *
 * Rule order (first match wins):
 * 1. topic         - topic keyword + (grouping mention or date reference)
 * 2. decision_list - decision keyword + listing keyword + (grouping mention or date reference)
 * 3. quantitative  - statistics, counting, or listing of entity kinds
 * 4. generic       - everything else, answered from retrieved evidence
 *
 * "relationship" is never produced here; it is the intent of the structured
 * relationship entry point.
 *
 * Layer: Decision Layer (Intent Router)
 */

import type { QueryIntent } from "../query/types";
import { extractDateParts, hasRelativePeriod } from "../evidence/filters";
import { logDebug } from "../utils/logger";

export type ClassificationContext = {
  /** Canonical and alternate names of known groupings (workgroups). */
  groupingNames: string[];
};

export type IntentSignals = {
  topicKeyword: boolean;
  decisionKeyword: boolean;
  listingKeyword: boolean;
  statisticalKeyword: boolean;
  entityKindKeyword: boolean;
  countingKeyword: boolean;
  countingPhrase: boolean;
  groupingMention: boolean;
  dateReference: boolean;
};

export type IntentRuleName = "topic" | "decision_list" | "quantitative" | "generic";

export type IntentClassificationResult = {
  intent: QueryIntent;
  matchedRule: IntentRuleName;
  signals: IntentSignals;
};

export type IntentRule = {
  name: IntentRuleName;
  matches: (signals: IntentSignals) => boolean;
  intent: QueryIntent;
};

const TOPIC_KEYWORDS = ["topic", "topics", "discussed", "discussion", "discussions", "talked about", "themes", "tag", "tags"];
const DECISION_KEYWORDS = ["decision", "decisions", "decided", "agreed", "resolved"];
const LISTING_KEYWORDS = ["list", "show", "what were", "what are", "enumerate", "all"];
const STATISTICAL_KEYWORDS = [
  "average", "mean", "median", "minimum", "maximum", "min", "max",
  "trend", "statistics", "stats", "distribution", "per month",
];
const ENTITY_KIND_KEYWORDS = [
  "meeting", "meetings", "workgroup", "workgroups", "people", "person", "persons",
  "participant", "participants", "attendee", "attendees",
  "decision", "decisions", "topic", "topics",
];
const COUNTING_KEYWORDS = ["count", "total", "tally", "number of", "how many"];
const COUNTING_PHRASES = ["how many", "number of"];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "i").test(text);
}

function matchesKeywords(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => containsPhrase(text, keyword));
}

export function hasTopicKeyword(text: string): boolean {
  return matchesKeywords(text, TOPIC_KEYWORDS);
}

export function hasDecisionKeyword(text: string): boolean {
  return matchesKeywords(text, DECISION_KEYWORDS);
}

export function hasListingKeyword(text: string): boolean {
  return matchesKeywords(text, LISTING_KEYWORDS);
}

export function hasStatisticalKeyword(text: string): boolean {
  return matchesKeywords(text, STATISTICAL_KEYWORDS);
}

export function hasEntityKindKeyword(text: string): boolean {
  return matchesKeywords(text, ENTITY_KIND_KEYWORDS);
}

export function hasCountingKeyword(text: string): boolean {
  return matchesKeywords(text, COUNTING_KEYWORDS);
}

export function hasCountingPhrase(text: string): boolean {
  return matchesKeywords(text, COUNTING_PHRASES);
}

export function mentionsGrouping(text: string, groupingNames: string[]): boolean {
  if (containsPhrase(text, "workgroup")) return true;
  return groupingNames.some((name) => name.trim().length > 0 && containsPhrase(text, name.trim()));
}

export function hasDateReference(text: string): boolean {
  const { year, month } = extractDateParts(text);
  return year !== null || month !== null || hasRelativePeriod(text);
}

export function detectSignals(text: string, context: ClassificationContext): IntentSignals {
  return {
    topicKeyword: hasTopicKeyword(text),
    decisionKeyword: hasDecisionKeyword(text),
    listingKeyword: hasListingKeyword(text),
    statisticalKeyword: hasStatisticalKeyword(text),
    entityKindKeyword: hasEntityKindKeyword(text),
    countingKeyword: hasCountingKeyword(text),
    countingPhrase: hasCountingPhrase(text),
    groupingMention: mentionsGrouping(text, context.groupingNames),
    dateReference: hasDateReference(text),
  };
}

export const INTENT_RULES: readonly IntentRule[] = [
  {
    name: "topic",
    matches: (s) => s.topicKeyword && (s.groupingMention || s.dateReference),
    intent: "topic",
  },
  {
    name: "decision_list",
    matches: (s) => s.decisionKeyword && s.listingKeyword && (s.groupingMention || s.dateReference),
    intent: "decision_list",
  },
  {
    name: "quantitative",
    matches: (s) =>
      s.statisticalKeyword ||
      (s.entityKindKeyword && s.countingKeyword) ||
      s.countingPhrase ||
      (s.listingKeyword && s.entityKindKeyword),
    intent: "quantitative",
  },
  {
    name: "generic",
    matches: () => true,
    intent: "generic",
  },
];

export function classifyIntent(text: string, context: ClassificationContext = { groupingNames: [] }): IntentClassificationResult {
  const signals = detectSignals(text, context);
  const rule = INTENT_RULES.find((r) => r.matches(signals)) ?? INTENT_RULES[INTENT_RULES.length - 1];

  logDebug(`[Intent] ${rule.intent} via rule "${rule.name}"`, { intent: rule.intent });
  return { intent: rule.intent, matchedRule: rule.name, signals };
}
