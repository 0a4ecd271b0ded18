/**
 * Evidence Filters
 *
 * Purpose:
 * Narrow vector-search results to what the question actually asks about.
 * Each filter is triggered by the query text alone, returns a new array,
 * and never reorders what it keeps.
 *
 * - Record identifier: "what did meeting 3f2b8c1e-... say" keeps that record only
 * - Whole word: "what was said about AGI" keeps chunks containing AGI, not AGIX
 * - Date range: "in March 2025" keeps chunks dated inside that month
 *
 * Layer: Evidence
 */

import {
  addDays,
  addMonths,
  addQuarters,
  addWeeks,
  addYears,
  format,
  isValid,
  parseISO,
  startOfDay,
  startOfMonth,
  startOfQuarter,
  startOfWeek,
  startOfYear,
  subDays,
} from "date-fns";
import type { ArchiveStore } from "../storage";
import type { EvidenceItem } from "../query/types";
import { logDebug } from "../utils/logger";
import { canonicalRecordId } from "./recordIds";

// ─── Record identifier ───────────────────────────────────────────────────────

export function filterByRecordId(evidence: EvidenceItem[], recordId: string): EvidenceItem[] {
  return evidence.filter((item) => canonicalRecordId(item.recordId) === recordId);
}

// ─── Whole-word entity match ────────────────────────────────────────────────

const WHOLE_WORD_TRIGGERS: RegExp[] = [
  /what\s+was\s+said\s+about/i,
  /tell\s+me\s+about/i,
  /what\s+about/i,
  /mentioned\s+about/i,
  /discussed\s+about/i,
  /talked\s+about/i,
];

const STOP_WORDS = new Set([
  "the", "a", "an", "this", "that", "these", "those",
  "what", "who", "when", "where", "why", "how",
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
]);

const CAPITALIZED_RUN = /^[A-Z][A-Za-z0-9]+(?:\s+[A-Z][A-Za-z0-9]+)*/;
const SAID_ABOUT = /\b(?:said|mentioned|discussed|talked)\s+about\s+/gi;
const ABOUT = /\b(?:about|regarding|concerning|on)\s+/gi;
const QUOTED_PHRASE = /["']([A-Z][A-Za-z0-9]+(?:\s+[A-Z][A-Za-z0-9]+)*)["']/g;
const LEADING_SUBJECT = /^([A-Z][A-Za-z0-9]+)\s+(?:was|is|are)\b/;

export function shouldApplyWholeWordFilter(query: string): boolean {
  return WHOLE_WORD_TRIGGERS.some((pattern) => pattern.test(query));
}

function capitalizedRunsAfter(query: string, trigger: RegExp): string[] {
  const runs: string[] = [];
  for (const match of query.matchAll(trigger)) {
    const rest = query.slice((match.index ?? 0) + match[0].length);
    const run = CAPITALIZED_RUN.exec(rest);
    if (run) runs.push(run[0]);
  }
  return runs;
}

/**
 * Capitalized phrases the question is probably about, in order of first
 * appearance. Trigger words match in any case; the phrase itself must start
 * with a capital letter.
 */
export function extractEntityPhrases(query: string): string[] {
  const candidates = [
    ...capitalizedRunsAfter(query, SAID_ABOUT),
    ...capitalizedRunsAfter(query, ABOUT),
    ...Array.from(query.matchAll(QUOTED_PHRASE), (m) => m[1]),
  ];
  const subject = LEADING_SUBJECT.exec(query);
  if (subject) candidates.push(subject[1]);

  const phrases: string[] = [];
  for (const raw of candidates) {
    const phrase = raw.trim();
    if (phrase.length < 2 || STOP_WORDS.has(phrase.toLowerCase())) continue;
    if (!phrases.includes(phrase)) phrases.push(phrase);
  }
  return phrases;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function containsWholeWord(text: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "i").test(text);
}

export function filterByWholeWord(evidence: EvidenceItem[], phrases: string[]): EvidenceItem[] {
  if (phrases.length === 0) return evidence.slice();
  return evidence.filter((item) => phrases.some((phrase) => containsWholeWord(item.text, phrase)));
}

// ─── Date range ──────────────────────────────────────────────────────────────

const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sept: 9, sep: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

const YEAR = /\b(?:19|20)\d{2}\b/;
const MONTH_WORD = new RegExp(`\\b(${Object.keys(MONTHS).join("|")})\\b`, "i");
// "may" is also a verb: only "may 2025" or "in may" count
const MAY = /\bmay\s+(?:19|20)\d{2}\b|\bin\s+may\b/i;

export type DateParts = {
  year: number | null;
  month: number | null;
};

export type DateWindow = {
  start: string; // inclusive, YYYY-MM-DD
  end: string; // exclusive
};

export function extractDateParts(query: string): DateParts {
  const yearMatch = YEAR.exec(query);
  const year = yearMatch ? Number(yearMatch[0]) : null;

  const monthMatch = MONTH_WORD.exec(query);
  const mayMatch = MAY.exec(query);
  let month: number | null = null;
  if (monthMatch && (!mayMatch || monthMatch.index <= mayMatch.index)) {
    month = MONTHS[monthMatch[1].toLowerCase()] ?? null;
  } else if (mayMatch) {
    month = 5;
  }

  return { year, month };
}

export function dateWindowFor(parts: DateParts, now: Date = new Date()): DateWindow | null {
  const { year, month } = parts;
  if (year === null && month === null) return null;

  let start: Date;
  let end: Date;
  if (month !== null) {
    start = new Date(year ?? now.getFullYear(), month - 1, 1);
    end = addMonths(start, 1);
  } else {
    start = new Date(year ?? now.getFullYear(), 0, 1);
    end = addYears(start, 1);
  }
  return { start: format(start, "yyyy-MM-dd"), end: format(end, "yyyy-MM-dd") };
}

type RelativePeriod = {
  pattern: RegExp;
  window: (now: Date) => { start: Date; end: Date };
};

const RECENT_DAYS = 30;

function monthFrom(start: Date) {
  return { start, end: addMonths(start, 1) };
}

function weekFrom(start: Date) {
  return { start, end: addWeeks(start, 1) };
}

function quarterFrom(start: Date) {
  return { start, end: addQuarters(start, 1) };
}

function yearFrom(start: Date) {
  return { start, end: addYears(start, 1) };
}

function dayFrom(start: Date) {
  return { start, end: addDays(start, 1) };
}

// Weeks start on Monday.
const RELATIVE_PERIODS: RelativePeriod[] = [
  { pattern: /\blast\s+month\b/i, window: (now) => monthFrom(addMonths(startOfMonth(now), -1)) },
  { pattern: /\bthis\s+month\b/i, window: (now) => monthFrom(startOfMonth(now)) },
  { pattern: /\bnext\s+month\b/i, window: (now) => monthFrom(addMonths(startOfMonth(now), 1)) },
  { pattern: /\blast\s+year\b/i, window: (now) => yearFrom(addYears(startOfYear(now), -1)) },
  { pattern: /\bthis\s+year\b/i, window: (now) => yearFrom(startOfYear(now)) },
  { pattern: /\blast\s+week\b/i, window: (now) => weekFrom(addWeeks(startOfWeek(now, { weekStartsOn: 1 }), -1)) },
  { pattern: /\bthis\s+week\b/i, window: (now) => weekFrom(startOfWeek(now, { weekStartsOn: 1 })) },
  { pattern: /\blast\s+quarter\b/i, window: (now) => quarterFrom(addQuarters(startOfQuarter(now), -1)) },
  { pattern: /\bthis\s+quarter\b/i, window: (now) => quarterFrom(startOfQuarter(now)) },
  { pattern: /\byesterday\b/i, window: (now) => dayFrom(subDays(startOfDay(now), 1)) },
  { pattern: /\btoday\b/i, window: (now) => dayFrom(startOfDay(now)) },
  {
    pattern: /\brecently\b/i,
    window: (now) => ({ start: subDays(startOfDay(now), RECENT_DAYS), end: addDays(startOfDay(now), 1) }),
  },
];

export function hasRelativePeriod(query: string): boolean {
  return RELATIVE_PERIODS.some((period) => period.pattern.test(query));
}

/**
 * Window for the first relative period named in the query ("last month",
 * "this year", "recently" = the last 30 days and today), counted from `now`.
 */
export function relativeWindowFor(query: string, now: Date = new Date()): DateWindow | null {
  const period = RELATIVE_PERIODS.find((p) => p.pattern.test(query));
  if (!period) return null;
  const { start, end } = period.window(now);
  return { start: format(start, "yyyy-MM-dd"), end: format(end, "yyyy-MM-dd") };
}

/**
 * Date window a question is scoped to: an absolute month or year when one is
 * named, else a relative period.
 */
export function queryWindowFor(query: string, now: Date = new Date()): DateWindow | null {
  return dateWindowFor(extractDateParts(query), now) ?? relativeWindowFor(query, now);
}

/**
 * YYYY-MM-DD part of a stored date, or null when it cannot be read.
 */
export function toIsoDay(date: string | null | undefined): string | null {
  if (!date) return null;
  const day = date.split("T")[0];
  return /^\d{4}-\d{2}-\d{2}$/.test(day) && isValid(parseISO(day)) ? day : null;
}

export type DateFilterResult = {
  evidence: EvidenceItem[];
  undatedCount: number;
};

/**
 * Items whose date cannot be determined (none on the item, no record in the
 * store, or the lookup failed) are kept.
 */
export async function filterByDateRange(
  evidence: EvidenceItem[],
  window: DateWindow,
  store?: Pick<ArchiveStore, "getMeeting">,
): Promise<DateFilterResult> {
  const kept: EvidenceItem[] = [];
  let undatedCount = 0;

  for (const item of evidence) {
    const day = toIsoDay(item.date) ?? (await lookupRecordDay(item.recordId, store));
    if (day === null) {
      undatedCount++;
      kept.push(item);
    } else if (day >= window.start && day < window.end) {
      kept.push(item);
    }
  }

  return { evidence: kept, undatedCount };
}

async function lookupRecordDay(recordId: string, store?: Pick<ArchiveStore, "getMeeting">): Promise<string | null> {
  const canonical = canonicalRecordId(recordId);
  if (!store || !canonical) return null;
  try {
    const meeting = await store.getMeeting(canonical);
    return toIsoDay(meeting?.date);
  } catch (err) {
    logDebug(`[EvidenceFilter] Date lookup failed for ${canonical}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}
