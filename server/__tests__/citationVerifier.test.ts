/**
 * Unit Tests: Citation Verifier, Negative Response Policy, Messages
 */

import { describe, it, expect } from "vitest";
import { noEvidenceCitation } from "../evidence/citations";
import { NO_EXTRACTION, type Citation } from "../query/types";
import { verifyCitations } from "../verification/citationVerifier";
import { verificationFailureMessage } from "../verification/messages";
import { applyNegativeResponsePolicy, isNegativeResponse } from "../verification/negativeResponse";
import { rec } from "./fakes";

function citation(recordId: string, withExtraction: boolean): Citation {
  return {
    recordId,
    date: "2025-01-08",
    groupingName: "Archives Workgroup",
    excerpt: "Notes",
    extraction: withExtraction
      ? { kind: "present", chunkType: "decision", entities: ["Archives Workgroup"], relationships: [] }
      : NO_EXTRACTION,
  };
}

describe("verifyCitations", () => {
  it("fails with missing_citations when there are none", () => {
    expect(verifyCitations([], false)).toEqual({
      verified: false,
      failure: "missing_citations",
      citationCount: 0,
      validCitationCount: 0,
      hasInvalidCitations: false,
    });
  });

  it("fails with invalid_citations when every citation is a sentinel or malformed", () => {
    const result = verifyCitations([noEvidenceCitation(), citation("meeting-7", true)], false);

    expect(result.failure).toBe("invalid_citations");
    expect(result.citationCount).toBe(2);
    expect(result.hasInvalidCitations).toBe(true);
  });

  it("fails with missing_entity_extraction when required and absent", () => {
    const result = verifyCitations([citation(rec(1), false), citation(rec(2), false)], true);

    expect(result).toEqual({
      verified: false,
      failure: "missing_entity_extraction",
      citationCount: 2,
      validCitationCount: 2,
      hasInvalidCitations: false,
    });
  });

  it("passes without extraction when it is not required", () => {
    const result = verifyCitations([citation(rec(1), false)], false);

    expect(result.verified).toBe(true);
    expect(result.failure).toBeNull();
  });

  it("counts only extracted citations as valid when extraction is required", () => {
    const result = verifyCitations([citation(rec(1), true), citation(rec(2), false), noEvidenceCitation()], true);

    expect(result).toEqual({
      verified: true,
      failure: null,
      citationCount: 3,
      validCitationCount: 1,
      hasInvalidCitations: true,
    });
  });

  it("treats a present but empty extraction as absent", () => {
    const empty: Citation = {
      ...citation(rec(1), false),
      extraction: { kind: "present", chunkType: "", entities: [], relationships: [] },
    };

    expect(verifyCitations([empty], true).failure).toBe("missing_entity_extraction");
  });
});

describe("verificationFailureMessage", () => {
  it("explains each failure", () => {
    expect(verificationFailureMessage(verifyCitations([], true))).toMatch(/^\*\*No citations found\.\*\*/);
    expect(verificationFailureMessage(verifyCitations([noEvidenceCitation()], true))).toMatch(
      /^\*\*No valid citations found\.\*\*/,
    );
    expect(verificationFailureMessage(verifyCitations([citation(rec(1), false)], true))).toMatch(
      /^\*\*Citations lack entity extraction verification\.\*\*/,
    );
  });

  it("is empty for a passing result", () => {
    expect(verificationFailureMessage(verifyCitations([citation(rec(1), true)], true))).toBe("");
  });
});

describe("isNegativeResponse", () => {
  it.each([
    "AGI is not mentioned in these meetings.",
    "There was no specific mention of the budget.",
    "I could not find anything about that.",
    "No, the workgroup did not meet.",
    "There were no meetings in June.",
    "The evidence does not appear to cover this.",
    "",
    "   ",
  ])("flags %j", (answer) => {
    expect(isNegativeResponse(answer)).toBe(true);
  });

  it.each([
    "The Archives Workgroup agreed to publish the summary.",
    "November meetings focused on the budget.",
    "Notably, the Treasury Guild approved the grant.",
  ])("accepts %j", (answer) => {
    expect(isNegativeResponse(answer)).toBe(false);
  });
});

describe("applyNegativeResponsePolicy", () => {
  it("keeps only sentinel citations and clears evidence for a negative answer", () => {
    const sentinel = noEvidenceCitation();

    const result = applyNegativeResponsePolicy("That topic is not discussed.", [citation(rec(1), true), sentinel]);

    expect(result).toEqual({ negative: true, citations: [sentinel] });
  });

  it("passes citations through for a supported answer", () => {
    const citations = [citation(rec(1), true)];

    const result = applyNegativeResponsePolicy("The budget was approved.", citations);

    expect(result).toEqual({ negative: false, citations });
  });
});
