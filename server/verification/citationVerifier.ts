/**
 * Citation Verifier
 *
 * Last gate before an answer leaves the system: an answer is only returned
 * as supported when its citations reference real meeting records, and on
 * the generic path when at least one of those carries extraction metadata.
 *
 * Checks, in order:
 * 1. no citations                      -> missing_citations
 * 2. every citation sentinel / non-UUID -> invalid_citations
 * 3. extraction required, none has it  -> missing_entity_extraction
 */

import { hasExtractionMetadata } from "../evidence/citations";
import { isCitableRecordId } from "../evidence/recordIds";
import type { Citation, VerificationResult } from "../query/types";
import { logInfo } from "../utils/logger";

export function isValidCitation(citation: Citation): boolean {
  return isCitableRecordId(citation.recordId);
}

export function verifyCitations(citations: Citation[], requireEntityExtraction: boolean): VerificationResult {
  if (citations.length === 0) {
    return {
      verified: false,
      failure: "missing_citations",
      citationCount: 0,
      validCitationCount: 0,
      hasInvalidCitations: false,
    };
  }

  const valid = citations.filter(isValidCitation);
  const hasInvalidCitations = valid.length < citations.length;

  if (valid.length === 0) {
    return {
      verified: false,
      failure: "invalid_citations",
      citationCount: citations.length,
      validCitationCount: 0,
      hasInvalidCitations: true,
    };
  }

  if (requireEntityExtraction) {
    const withExtraction = valid.filter((c) => hasExtractionMetadata(c.extraction));
    if (withExtraction.length === 0) {
      return {
        verified: false,
        failure: "missing_entity_extraction",
        citationCount: citations.length,
        validCitationCount: valid.length,
        hasInvalidCitations,
      };
    }

    logInfo(`[CitationVerifier] Verified ${withExtraction.length}/${citations.length} citations with extraction metadata`);
    return {
      verified: true,
      failure: null,
      citationCount: citations.length,
      validCitationCount: withExtraction.length,
      hasInvalidCitations,
    };
  }

  return {
    verified: true,
    failure: null,
    citationCount: citations.length,
    validCitationCount: valid.length,
    hasInvalidCitations,
  };
}
