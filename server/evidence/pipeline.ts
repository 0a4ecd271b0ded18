/**
 * Evidence Filter Pipeline
 *
 * Composes the three filters in a fixed order:
 *   record identifier -> whole word -> date range
 *
 * A filter that empties a non-empty input is an anomaly: the pipeline stops
 * there and reports which filter did it, and the caller answers "no evidence".
 */

import type { ArchiveStore } from "../storage";
import type { EvidenceItem, FilterAnomaly } from "../query/types";
import { logInfo, logWarn } from "../utils/logger";
import { findRecordIdInText } from "./recordIds";
import {
  extractEntityPhrases,
  filterByDateRange,
  filterByRecordId,
  filterByWholeWord,
  queryWindowFor,
  shouldApplyWholeWordFilter,
} from "./filters";

export type EvidenceFilterName = FilterAnomaly["filter"];

export type EvidencePipelineOptions = {
  store?: Pick<ArchiveStore, "getMeeting">;
  now?: Date;
  correlationId?: string;
};

export type EvidencePipelineResult = {
  evidence: EvidenceItem[];
  applied: EvidenceFilterName[];
  anomaly: FilterAnomaly | null;
  undatedCount: number;
};

export async function runEvidencePipeline(
  queryText: string,
  evidence: EvidenceItem[],
  options: EvidencePipelineOptions = {},
): Promise<EvidencePipelineResult> {
  const applied: EvidenceFilterName[] = [];
  let current = evidence.slice();

  const step = (filter: EvidenceFilterName, next: EvidenceItem[]): FilterAnomaly | null => {
    applied.push(filter);
    const inputCount = current.length;
    if (inputCount > next.length) {
      logInfo(`[EvidencePipeline] ${filter} kept ${next.length}/${inputCount}`, {
        correlationId: options.correlationId,
      });
    }
    current = next;
    if (inputCount > 0 && next.length === 0) {
      const anomaly: FilterAnomaly = { filter, inputCount };
      logWarn(`[EvidencePipeline] ${filter} filter removed all ${inputCount} items`, {
        correlationId: options.correlationId,
        filter,
        inputCount,
      });
      return anomaly;
    }
    return null;
  };

  const recordId = findRecordIdInText(queryText);
  if (recordId) {
    const anomaly = step("record_identifier", filterByRecordId(current, recordId));
    if (anomaly) return { evidence: [], applied, anomaly, undatedCount: 0 };
  }

  if (shouldApplyWholeWordFilter(queryText)) {
    const phrases = extractEntityPhrases(queryText);
    if (phrases.length > 0) {
      const anomaly = step("whole_word", filterByWholeWord(current, phrases));
      if (anomaly) return { evidence: [], applied, anomaly, undatedCount: 0 };
    }
  }

  let undatedCount = 0;
  const window = queryWindowFor(queryText, options.now);
  if (window) {
    const dated = await filterByDateRange(current, window, options.store);
    undatedCount = dated.undatedCount;
    if (undatedCount > 0) {
      logWarn(`[EvidencePipeline] ${undatedCount} item(s) without a readable date kept by date filter`, {
        correlationId: options.correlationId,
        windowStart: window.start,
        windowEnd: window.end,
      });
    }
    const anomaly = step("date_range", dated.evidence);
    if (anomaly) return { evidence: [], applied, anomaly, undatedCount };
  }

  return { evidence: current, applied, anomaly: null, undatedCount };
}
